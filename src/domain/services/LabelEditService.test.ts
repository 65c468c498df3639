import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigError } from "../../errors";
import { FakeJiraPort } from "../../testing/fakeJira";
import type { JiraIssueData } from "../models/JiraClientModels";
import { LabelEditService } from "./LabelEditService";

function issues(): JiraIssueData[] {
  return [
    { key: "DEMO-1", fields: { labels: ["a", "b"] } },
    { key: "DEMO-2", fields: { labels: ["a"] } },
    { key: "DEMO-3", fields: { labels: ["c"] } },
    { key: "DEMO-4", fields: {} },
  ];
}

function logged(): string[] {
  return vi.mocked(console.log).mock.calls.map((args) => String(args[0]));
}

describe("LabelEditService", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("logs the intended change on a dry run without writing", async () => {
    const jira = new FakeJiraPort(issues());
    const editor = new LabelEditService(jira, { dryRun: true });

    const result = await editor.editLabels({
      keys: ["DEMO-1"],
      add: ["c"],
      remove: ["a"],
    });

    expect(result).toEqual({ processed: 1, updated: 1 });
    expect(jira.updates).toEqual([]);
    expect(logged()).toEqual([
      "Add label 'c' to the issue DEMO-1",
      "Remove label 'a' from the issue DEMO-1",
      "DRY RUN: I would update issue DEMO-1 with labels: b, c",
      "Processed 1 issue(s)",
      "DRY RUN: I would have updated 1 issue(s)",
    ]);
  });

  it("writes only the issues whose labels change", async () => {
    const jira = new FakeJiraPort(issues(), {
      "project = DEMO": ["DEMO-2", "DEMO-3", "DEMO-4"],
    });
    const editor = new LabelEditService(jira);

    const result = await editor.editLabels({
      keys: ["DEMO-1"],
      jql: "project = DEMO",
      add: ["c"],
      remove: [],
    });

    expect(result).toEqual({ processed: 4, updated: 3 });
    expect(jira.updates).toEqual([
      { key: "DEMO-1", labels: ["a", "b", "c"] },
      { key: "DEMO-2", labels: ["a", "c"] },
      { key: "DEMO-4", labels: ["c"] },
    ]);
    expect(jira.searches).toEqual([{ jql: "project = DEMO", fields: ["labels"] }]);
    expect(logged()).toContain("Update issue DEMO-4 with labels: c");
    expect(logged().slice(-2)).toEqual(["Processed 4 issue(s)", "Updated 3 issue(s)"]);
  });

  it("changes nothing when run a second time", async () => {
    const jira = new FakeJiraPort(issues());
    const editor = new LabelEditService(jira);
    const request = { keys: ["DEMO-1", "DEMO-2"], add: ["c"], remove: ["a"] };

    await editor.editLabels(request);
    const second = await editor.editLabels(request);

    expect(jira.updates).toEqual([
      { key: "DEMO-1", labels: ["b", "c"] },
      { key: "DEMO-2", labels: ["c"] },
    ]);
    expect(second).toEqual({ processed: 2, updated: 0 });
  });

  it("drops a label named in both lists", async () => {
    const jira = new FakeJiraPort(issues());
    const editor = new LabelEditService(jira);

    await editor.editLabels({ keys: ["DEMO-3"], add: ["x"], remove: ["x", "c"] });

    expect(jira.updates).toEqual([{ key: "DEMO-3", labels: [] }]);
  });

  it("requires labels to add or remove", async () => {
    const editor = new LabelEditService(new FakeJiraPort(issues()));

    await expect(
      editor.editLabels({ keys: ["DEMO-1"], add: [], remove: [] })
    ).rejects.toThrow(
      new ConfigError("no labels specified for adding and/or removing")
    );
  });

  it("requires keys or a query", async () => {
    const editor = new LabelEditService(new FakeJiraPort(issues()));

    await expect(
      editor.editLabels({ keys: [], add: ["c"], remove: [] })
    ).rejects.toBeInstanceOf(ConfigError);
  });
});
