import { type RestData, isRestData } from "../JiraClientModels";

/** Machine-readable form of a record, ready for YAML or JSON output. */
export type Struct = Record<string, unknown>;

export const UNKNOWN = "Unknown";

/**
 * Read-only view over one JSON object of a REST response. Nested objects are
 * wrapped only when a getter asks for them.
 */
export class RestRecord {
  constructor(protected readonly data: RestData) {}

  get selfUrl(): string | undefined {
    return this.string("self");
  }

  /** Two records are the same entity when their `self` URLs match. */
  equals(other: RestRecord): boolean {
    return this.selfUrl === other.selfUrl;
  }

  toString(): string {
    return `${this.constructor.name}(${JSON.stringify(this.selfUrl ?? null)})`;
  }

  protected value(key: string): unknown {
    return this.data[key];
  }

  protected string(key: string): string | undefined;
  protected string(key: string, fallback: string): string;
  protected string(key: string, fallback?: string): string | undefined {
    const v = this.data[key];
    return typeof v === "string" ? v : fallback;
  }

  protected number(key: string): number | undefined {
    const v = this.data[key];
    return typeof v === "number" ? v : undefined;
  }

  protected boolean(key: string): boolean | undefined {
    const v = this.data[key];
    return typeof v === "boolean" ? v : undefined;
  }

  protected child<T>(key: string, make: (data: RestData) => T): T | undefined {
    const v = this.data[key];
    return isRestData(v) ? make(v) : undefined;
  }

  protected children<T>(key: string, make: (data: RestData) => T): T[] {
    const v = this.data[key];
    return Array.isArray(v) ? v.filter(isRestData).map(make) : [];
  }
}

/** Lookup objects (priority, issue type, ...) keyed by id and shown by name. */
export class NamedRecord extends RestRecord {
  get id(): string | undefined {
    return this.string("id");
  }

  get name(): string | undefined {
    return this.string("name");
  }

  get iconUrl(): string | undefined {
    return this.string("iconUrl");
  }
}

/** Builds a struct from ordered entries, dropping the `undefined` ones. */
export function compactStruct(entries: Array<[string, unknown]>): Struct {
  const out: Struct = {};
  for (const [key, value] of entries) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}
