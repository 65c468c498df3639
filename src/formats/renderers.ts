import type { OutputFormat } from "../domain/models/ConfigModels";
import type { JiraIssue } from "../domain/models/records/JiraIssue";
import { renderIssueText } from "./text";
import { renderIssueYaml } from "./yaml";

export interface IssueRenderer {
  extension: string;
  render(issue: JiraIssue, browseUrl: string): string;
}

export const ISSUE_RENDERERS: Record<OutputFormat, IssueRenderer> = {
  yaml: { extension: "yaml", render: renderIssueYaml },
  text: { extension: "txt", render: renderIssueText },
};
