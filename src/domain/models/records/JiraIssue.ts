import { FieldValue } from "../FieldValue";
import { type JiraIssueData, type RestData, isRestData } from "../JiraClientModels";
import { JiraAttachment } from "./JiraAttachment";
import { JiraAuthor } from "./JiraAuthor";
import { JiraCommentList } from "./JiraComment";
import {
  JiraIssueType,
  JiraPriority,
  JiraProject,
  JiraResolution,
  JiraStatus,
} from "./JiraLookups";
import { RestRecord, type Struct, UNKNOWN, compactStruct } from "./RestRecord";

const asString = (v: unknown): string | undefined =>
  typeof v === "string" ? v : undefined;

const asStringList = (v: unknown): string[] | undefined =>
  Array.isArray(v)
    ? v.filter((item): item is string => typeof item === "string")
    : undefined;

function asRecord<T>(make: (data: RestData) => T) {
  return (v: unknown): T | undefined => (isRestData(v) ? make(v) : undefined);
}

function asRecordList<T>(make: (data: RestData) => T) {
  return (v: unknown): T[] | undefined =>
    Array.isArray(v) ? v.filter(isRestData).map(make) : undefined;
}

const nameOf = (record: { name: string | undefined }) => record.name ?? UNKNOWN;
const authorName = (author: JiraAuthor) => author.displayName ?? UNKNOWN;
const keep = <T>(value: T) => value;

export class JiraIssue extends RestRecord {
  constructor(data: JiraIssueData | RestData) {
    super(data);
  }

  get id(): string | undefined {
    return this.string("id");
  }

  get key(): string {
    return this.string("key", "");
  }

  get fields(): RestData {
    const fields = this.value("fields");
    return isRestData(fields) ? fields : {};
  }

  /** Raw lookup of one entry of the `fields` map. */
  getField(name: string): FieldValue<unknown> {
    const fields = this.fields;
    if (!Object.hasOwn(fields, name)) return FieldValue.absent;
    const value = fields[name];
    return value === null ? FieldValue.empty : FieldValue.of(value);
  }

  get project(): FieldValue<JiraProject> {
    return this.field("project", asRecord((d) => new JiraProject(d)));
  }

  get parent(): FieldValue<JiraIssue> {
    return this.field("parent", asRecord((d) => new JiraIssue(d)));
  }

  get summary(): FieldValue<string> {
    return this.field("summary", asString);
  }

  get description(): FieldValue<string> {
    return this.field("description", asString);
  }

  get labels(): FieldValue<string[]> {
    return this.field("labels", asStringList);
  }

  get status(): FieldValue<JiraStatus> {
    return this.field("status", asRecord((d) => new JiraStatus(d)));
  }

  get priority(): FieldValue<JiraPriority> {
    return this.field("priority", asRecord((d) => new JiraPriority(d)));
  }

  get issuetype(): FieldValue<JiraIssueType> {
    return this.field("issuetype", asRecord((d) => new JiraIssueType(d)));
  }

  get resolution(): FieldValue<JiraResolution> {
    return this.field("resolution", asRecord((d) => new JiraResolution(d)));
  }

  get reporter(): FieldValue<JiraAuthor> {
    return this.field("reporter", asRecord((d) => new JiraAuthor(d)));
  }

  get assignee(): FieldValue<JiraAuthor> {
    return this.field("assignee", asRecord((d) => new JiraAuthor(d)));
  }

  get created(): FieldValue<string> {
    return this.field("created", asString);
  }

  get updated(): FieldValue<string> {
    return this.field("updated", asString);
  }

  get resolutiondate(): FieldValue<string> {
    return this.field("resolutiondate", asString);
  }

  get comments(): FieldValue<JiraCommentList> {
    return this.field("comment", asRecord((d) => new JiraCommentList(d)));
  }

  get attachments(): FieldValue<JiraAttachment[]> {
    return this.field(
      "attachment",
      asRecordList((d) => new JiraAttachment(d))
    );
  }

  get subtasks(): FieldValue<JiraIssue[]> {
    return this.field("subtasks", asRecordList((d) => new JiraIssue(d)));
  }

  toStruct(): Struct {
    return compactStruct([
      ["key", this.key],
      ["summary", FieldValue.toStruct(this.summary, keep)],
      ["issuetype", FieldValue.toStruct(this.issuetype, (t) => t.name ?? null)],
      ["status", FieldValue.toStruct(this.status, (s) => s.name ?? null)],
      ["priority", FieldValue.toStruct(this.priority, (p) => p.name ?? null)],
      ["resolution", FieldValue.toStruct(this.resolution, (r) => r.toStruct())],
      ["reporter", FieldValue.toStruct(this.reporter, (a) => a.toStruct())],
      ["assignee", FieldValue.toStruct(this.assignee, (a) => a.toStruct())],
      ["parent", FieldValue.toStruct(this.parent, (p) => p.key)],
      ["description", FieldValue.toStruct(this.description, keep)],
      ["labels", FieldValue.toStruct(this.labels, keep)],
      ["created", FieldValue.toStruct(this.created, keep)],
      ["updated", FieldValue.toStruct(this.updated, keep)],
      ["resolutiondate", FieldValue.toStruct(this.resolutiondate, keep)],
      [
        "subtasks",
        FieldValue.toStruct(this.subtasks, (list) => list.map((s) => s.key)),
      ],
      [
        "attachments",
        FieldValue.toStruct(this.attachments, (list) =>
          list.map((a) => a.toStruct())
        ),
      ],
      ["comments", FieldValue.toStruct(this.comments, (c) => c.toStruct())],
    ]);
  }

  toText(): string {
    const text = FieldValue.toText;
    const subtasks = text(
      this.subtasks,
      (list) => (list.length ? list.map((s) => s.key).join(", ") : "none"),
      "none"
    );

    return [
      `Issue: ${this.key}`,
      `Type: ${text(this.issuetype, nameOf, UNKNOWN)}`,
      `Status: ${text(this.status, nameOf, UNKNOWN)}`,
      `Priority: ${text(this.priority, nameOf, UNKNOWN)}`,
      `Reporter: ${text(this.reporter, authorName, UNKNOWN)}`,
      `Assignee: ${text(this.assignee, authorName, UNKNOWN)}`,
      `Resolution: ${text(this.resolution, nameOf, "Unresolved")}`,
      `Subtasks: ${subtasks}`,
      `Summary: ${text(this.summary, keep)}`,
      "Description:",
      "",
      text(this.description, keep),
      "---",
      `Labels: ${text(this.labels, (l) => l.join(", "))}`,
      `Created: ${text(this.created, keep)}`,
      `Updated: ${text(this.updated, keep)}`,
      "Comments:",
      "",
      text(this.comments, (c) => c.toText()),
    ].join("\n");
  }

  /** A value of the wrong JSON type is reported as null. */
  private field<T>(
    name: string,
    convert: (raw: unknown) => T | undefined
  ): FieldValue<T> {
    const raw = this.getField(name);
    if (raw.state !== "present") return raw;
    const value = convert(raw.value);
    return value === undefined ? FieldValue.empty : FieldValue.of(value);
  }
}
