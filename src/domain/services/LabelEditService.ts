import { ConfigError } from "../../errors";
import { computeLabelChange } from "../../utils/labels";
import { FieldValue } from "../models/FieldValue";
import type { JiraIssue } from "../models/records/JiraIssue";
import type { LabelEditResult } from "../models/RunResults";
import type { JiraPort } from "../ports/JiraPort";

export interface LabelEditOptions {
  /** Log the intended updates without writing them. */
  dryRun?: boolean;
}

export interface LabelEditRequest {
  keys: string[];
  jql?: string;
  add: string[];
  remove: string[];
}

const LABEL_FIELDS = ["labels"];

export class LabelEditService {
  private dryRun: boolean;

  constructor(
    private jira: JiraPort,
    options: LabelEditOptions = {}
  ) {
    this.dryRun = options.dryRun ?? false;
  }

  /** Issues named by key first, then the ones the query matches. */
  private async *selectIssues(
    keys: string[],
    jql: string | undefined
  ): AsyncGenerator<JiraIssue> {
    for (const key of keys) {
      yield await this.jira.getIssue(key, LABEL_FIELDS);
    }
    if (jql) {
      yield* this.jira.searchIssues(jql, LABEL_FIELDS);
    }
  }

  async editLabels(request: LabelEditRequest): Promise<LabelEditResult> {
    const { keys, jql, add, remove } = request;
    if (add.length === 0 && remove.length === 0) {
      throw new ConfigError("no labels specified for adding and/or removing");
    }
    if (keys.length === 0 && !jql) {
      throw new ConfigError("no issue keys or JQL query specified");
    }

    const result: LabelEditResult = { processed: 0, updated: 0 };
    for await (const issue of this.selectIssues(keys, jql)) {
      result.processed++;
      if (await this.applyToIssue(issue, add, remove)) result.updated++;
    }

    console.log(`Processed ${result.processed} issue(s)`);
    if (this.dryRun) {
      console.log(`DRY RUN: I would have updated ${result.updated} issue(s)`);
    } else {
      console.log(`Updated ${result.updated} issue(s)`);
    }
    return result;
  }

  /** Returns whether the issue's labels changed (or would have). */
  async applyToIssue(
    issue: JiraIssue,
    add: string[],
    remove: string[]
  ): Promise<boolean> {
    const key = issue.key;
    const change = computeLabelChange(
      FieldValue.valueOr(issue.labels, []),
      add,
      remove
    );
    if (!change.changed) return false;

    for (const label of change.added) {
      console.log(`Add label '${label}' to the issue ${key}`);
    }
    for (const label of change.removed) {
      console.log(`Remove label '${label}' from the issue ${key}`);
    }

    const list = change.labels.join(", ");
    if (this.dryRun) {
      console.log(`DRY RUN: I would update issue ${key} with labels: ${list}`);
    } else {
      console.log(`Update issue ${key} with labels: ${list}`);
      await this.jira.updateIssueLabels(key, change.labels);
    }
    return true;
  }
}
