/**
 * Value of an issue field as the service reported it.
 *
 * `absent` means the key was not in the payload at all (the field was not
 * requested), which is different from the service answering with `null`.
 */
export type FieldValue<T> =
  | { readonly state: "absent" }
  | { readonly state: "null" }
  | { readonly state: "present"; readonly value: T };

export const NOT_FETCHED = "<not downloaded>";

export namespace FieldValue {
  export const absent: FieldValue<never> = { state: "absent" };
  export const empty: FieldValue<never> = { state: "null" };

  export function of<T>(value: T): FieldValue<T> {
    return { state: "present", value };
  }

  export function hasData<T>(
    field: FieldValue<T>
  ): field is { state: "present"; value: T } {
    return field.state === "present";
  }

  export function valueOr<T, D>(field: FieldValue<T>, fallback: D): T | D {
    return field.state === "present" ? field.value : fallback;
  }

  /** Human-readable rendering; `ifNull` is used when the service sent null. */
  export function toText<T>(
    field: FieldValue<T>,
    render: (value: T) => string,
    ifNull = ""
  ): string {
    switch (field.state) {
      case "absent":
        return NOT_FETCHED;
      case "null":
        return ifNull;
      case "present":
        return render(field.value);
    }
  }

  /** Machine-readable rendering; `undefined` means "omit the key". */
  export function toStruct<T, U>(
    field: FieldValue<T>,
    render: (value: T) => U
  ): U | null | undefined {
    switch (field.state) {
      case "absent":
        return undefined;
      case "null":
        return null;
      case "present":
        return render(field.value);
    }
  }
}
