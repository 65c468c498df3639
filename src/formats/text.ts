import type { JiraIssue } from "../domain/models/records/JiraIssue";

export function renderIssueText(issue: JiraIssue, browseUrl: string): string {
  return `Link: ${browseUrl}\n${issue.toText()}`;
}
