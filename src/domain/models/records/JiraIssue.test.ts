import { describe, expect, it } from "vitest";
import { parse } from "yaml";
import { FieldValue } from "../FieldValue";
import type { JiraIssueData } from "../JiraClientModels";
import { renderIssueYaml } from "../../../formats/yaml";
import { JiraIssue } from "./JiraIssue";

const COMMENT_DATE = "2024-01-02T12:00:00.000+0000";

function fullIssue(): JiraIssueData {
  return {
    id: "10001",
    key: "DEMO-1",
    self: "https://example.atlassian.net/rest/api/2/issue/10001",
    fields: {
      summary: "Printer on fire",
      description: "Smoke everywhere.",
      issuetype: { id: "1", name: "Bug", subtask: false },
      status: {
        name: "In Progress",
        statusCategory: { key: "indeterminate", name: "In Progress" },
      },
      priority: { name: "High" },
      resolution: null,
      reporter: { accountId: "a-1", displayName: "Alice Example" },
      assignee: null,
      labels: ["hardware", "urgent"],
      created: "2024-01-02T10:00:00.000+0000",
      updated: "2024-01-03T11:00:00.000+0000",
      resolutiondate: null,
      subtasks: [{ key: "DEMO-2", fields: {} }],
      attachment: [],
      comment: {
        comments: [
          {
            id: "1",
            author: { displayName: "Bob" },
            body: "On it.",
            created: COMMENT_DATE,
            updated: COMMENT_DATE,
          },
        ],
        total: 1,
        maxResults: 1,
        startAt: 0,
      },
    },
  };
}

describe("JiraIssue", () => {
  it("tells absent fields apart from null ones", () => {
    const issue = new JiraIssue({
      key: "DEMO-3",
      fields: { summary: "Partial", assignee: null },
    });

    expect(issue.summary).toEqual({ state: "present", value: "Partial" });
    expect(issue.assignee).toEqual({ state: "null" });
    expect(issue.reporter).toEqual({ state: "absent" });
  });

  it("reports a value of the wrong type as null", () => {
    const issue = new JiraIssue({ key: "DEMO-3", fields: { summary: 42 } });
    expect(issue.summary.state).toBe("null");
  });

  it("wraps nested objects on access", () => {
    const issue = new JiraIssue(fullIssue());
    const status = issue.status;

    expect(FieldValue.hasData(status) && status.value.statusCategory?.key).toBe(
      "indeterminate"
    );
    expect(FieldValue.valueOr(issue.subtasks, []).map((s) => s.key)).toEqual([
      "DEMO-2",
    ]);
  });

  it("compares records by their self URL", () => {
    const a = new JiraIssue(fullIssue());
    const b = new JiraIssue({ ...fullIssue(), fields: {} });
    const other = new JiraIssue({ ...fullIssue(), self: "https://example.atlassian.net/rest/api/2/issue/2" });
    const anonymous = new JiraIssue({ key: "DEMO-1" });

    expect(a.equals(b)).toBe(true);
    expect(a.equals(other)).toBe(false);
    expect(anonymous.equals(new JiraIssue({ key: "DEMO-2" }))).toBe(true);
    expect(anonymous.equals(a)).toBe(false);
  });

  it("builds the structured form", () => {
    expect(new JiraIssue(fullIssue()).toStruct()).toEqual({
      key: "DEMO-1",
      summary: "Printer on fire",
      issuetype: "Bug",
      status: "In Progress",
      priority: "High",
      resolution: null,
      reporter: { displayName: "Alice Example" },
      assignee: null,
      description: "Smoke everywhere.",
      labels: ["hardware", "urgent"],
      created: "2024-01-02T10:00:00.000+0000",
      updated: "2024-01-03T11:00:00.000+0000",
      resolutiondate: null,
      subtasks: ["DEMO-2"],
      attachments: [],
      comments: [
        {
          body: "On it.",
          created: COMMENT_DATE,
          updated: COMMENT_DATE,
          author: { displayName: "Bob" },
        },
      ],
    });
  });

  it("omits fields that were not fetched from the structured form", () => {
    const struct = new JiraIssue({
      key: "DEMO-4",
      fields: { labels: ["x"], parent: { key: "DEMO-1" } },
    }).toStruct();

    expect(struct).toEqual({ key: "DEMO-4", parent: "DEMO-1", labels: ["x"] });
  });

  it("keeps an empty comment list through YAML output", () => {
    const issue = new JiraIssue({
      key: "DEMO-5",
      fields: { summary: "Quiet", comment: { comments: [], total: 0 } },
    });

    const doc = parse(
      renderIssueYaml(issue, "https://example.atlassian.net/browse/DEMO-5")
    );
    expect(doc.comments).toEqual([]);
    expect(doc.browse_url).toBe("https://example.atlassian.net/browse/DEMO-5");
  });

  it("renders the text form", () => {
    const heading = `Bob ${COMMENT_DATE}`;
    const sep = "-".repeat(heading.length);

    expect(new JiraIssue(fullIssue()).toText()).toBe(
      [
        "Issue: DEMO-1",
        "Type: Bug",
        "Status: In Progress",
        "Priority: High",
        "Reporter: Alice Example",
        "Assignee: Unknown",
        "Resolution: Unresolved",
        "Subtasks: DEMO-2",
        "Summary: Printer on fire",
        "Description:",
        "",
        "Smoke everywhere.",
        "---",
        "Labels: hardware, urgent",
        "Created: 2024-01-02T10:00:00.000+0000",
        "Updated: 2024-01-03T11:00:00.000+0000",
        "Comments:",
        "",
        `${sep}\n${heading}\n${sep}\nOn it.\n`,
      ].join("\n")
    );
  });

  it("marks unfetched fields differently from null ones in text", () => {
    const lines = new JiraIssue({
      key: "DEMO-6",
      fields: { summary: "Sparse", assignee: null, description: null },
    })
      .toText()
      .split("\n");

    expect(lines).toContain("Assignee: Unknown");
    expect(lines).toContain("Reporter: <not downloaded>");
    expect(lines).toContain("Type: <not downloaded>");
    expect(lines).toContain("Subtasks: <not downloaded>");
    expect(lines).toContain("Labels: <not downloaded>");
    expect(lines[lines.indexOf("Description:") + 2]).toBe("");
    expect(lines[lines.length - 1]).toBe("<not downloaded>");
  });
});
