import { type AuthorStruct, JiraAuthor, UNKNOWN_AUTHOR } from "./JiraAuthor";
import { RestRecord } from "./RestRecord";

export interface CommentStruct {
  body: string | null;
  created: string | null;
  updated: string | null;
  author?: AuthorStruct;
}

export class JiraComment extends RestRecord {
  get id(): string | undefined {
    return this.string("id");
  }

  get author(): JiraAuthor | undefined {
    return this.child("author", (d) => new JiraAuthor(d));
  }

  get body(): string | undefined {
    return this.string("body");
  }

  get created(): string | undefined {
    return this.string("created");
  }

  get updated(): string | undefined {
    return this.string("updated");
  }

  get jsdPublic(): boolean | undefined {
    return this.boolean("jsdPublic");
  }

  toStruct(): CommentStruct {
    const struct: CommentStruct = {
      body: this.body ?? null,
      created: this.created ?? null,
      updated: this.updated ?? null,
    };
    const author = this.author;
    if (author) struct.author = author.toStruct();
    return struct;
  }

  /** Author and date underlined by dashes, then the body. */
  toText(): string {
    const author = this.author?.toText() ?? UNKNOWN_AUTHOR;
    const heading = this.created ? `${author} ${this.created}` : author;
    const sep = "-".repeat(heading.length);
    return `${sep}\n${heading}\n${sep}\n${this.body ?? ""}\n`;
  }
}

/**
 * The `comment` field of an issue: the comments the search returned plus the
 * server-side total, which can be larger.
 */
export class JiraCommentList extends RestRecord {
  get comments(): JiraComment[] {
    return this.children("comments", (d) => new JiraComment(d));
  }

  get total(): number | undefined {
    return this.number("total");
  }

  get maxResults(): number | undefined {
    return this.number("maxResults");
  }

  get startAt(): number | undefined {
    return this.number("startAt");
  }

  get length(): number {
    return this.comments.length;
  }

  get isComplete(): boolean {
    const total = this.total;
    return total === undefined || total <= this.length;
  }

  toStruct(): CommentStruct[] {
    return this.comments.map((c) => c.toStruct());
  }

  toText(): string {
    return this.comments.map((c) => c.toText()).join("\n");
  }
}
