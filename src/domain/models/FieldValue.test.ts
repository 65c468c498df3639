import { describe, expect, it } from "vitest";
import { FieldValue, NOT_FETCHED } from "./FieldValue";

describe("FieldValue", () => {
  const upper = (s: string) => s.toUpperCase();

  it("renders each state as text", () => {
    expect(FieldValue.toText(FieldValue.absent, upper, "none")).toBe(NOT_FETCHED);
    expect(FieldValue.toText(FieldValue.empty, upper, "none")).toBe("none");
    expect(FieldValue.toText(FieldValue.of("abc"), upper)).toBe("ABC");
  });

  it("renders each state as a struct value", () => {
    expect(FieldValue.toStruct(FieldValue.absent, upper)).toBeUndefined();
    expect(FieldValue.toStruct(FieldValue.empty, upper)).toBeNull();
    expect(FieldValue.toStruct(FieldValue.of("abc"), upper)).toBe("ABC");
  });

  it("falls back when there is no value", () => {
    expect(FieldValue.valueOr(FieldValue.of(2), 0)).toBe(2);
    expect(FieldValue.valueOr(FieldValue.empty, 0)).toBe(0);
    expect(FieldValue.valueOr(FieldValue.absent, [])).toEqual([]);
  });
});
