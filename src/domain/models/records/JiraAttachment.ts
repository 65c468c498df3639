import { JiraAuthor } from "./JiraAuthor";
import { RestRecord, type Struct, compactStruct } from "./RestRecord";

export class JiraAttachment extends RestRecord {
  get id(): string | undefined {
    return this.string("id");
  }

  get filename(): string | undefined {
    return this.string("filename");
  }

  get created(): string | undefined {
    return this.string("created");
  }

  /** Size in bytes. */
  get size(): number | undefined {
    return this.number("size");
  }

  get mimeType(): string | undefined {
    return this.string("mimeType");
  }

  /** Absolute URL of the file content. */
  get content(): string | undefined {
    return this.string("content");
  }

  get thumbnail(): string | undefined {
    return this.string("thumbnail");
  }

  get author(): JiraAuthor | undefined {
    return this.child("author", (d) => new JiraAuthor(d));
  }

  toStruct(): Struct {
    return compactStruct([
      ["filename", this.filename ?? null],
      ["mimeType", this.mimeType ?? null],
      ["size", this.size ?? null],
      ["created", this.created ?? null],
      ["author", this.author?.toStruct()],
    ]);
  }
}
