import type { RestData } from "../JiraClientModels";
import { RestRecord } from "./RestRecord";

export const UNKNOWN_AUTHOR = "<unknown author>";

export interface AuthorStruct {
  displayName: string | null;
}

export class JiraAuthor extends RestRecord {
  get accountId(): string | undefined {
    return this.string("accountId");
  }

  get displayName(): string | undefined {
    return this.string("displayName");
  }

  get emailAddress(): string | undefined {
    return this.string("emailAddress");
  }

  get active(): boolean | undefined {
    return this.boolean("active");
  }

  get timeZone(): string | undefined {
    return this.string("timeZone");
  }

  get accountType(): string | undefined {
    return this.string("accountType");
  }

  get avatarUrls(): RestData | undefined {
    return this.child("avatarUrls", (urls) => urls);
  }

  toStruct(): AuthorStruct {
    return { displayName: this.displayName ?? null };
  }

  toText(): string {
    return this.displayName ?? UNKNOWN_AUTHOR;
  }
}
