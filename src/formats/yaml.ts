import { stringify } from "yaml";
import type { JiraIssue } from "../domain/models/records/JiraIssue";

/** The issue struct as a YAML document, with a link back to Jira. */
export function renderIssueYaml(issue: JiraIssue, browseUrl: string): string {
  return stringify({ ...issue.toStruct(), browse_url: browseUrl });
}
