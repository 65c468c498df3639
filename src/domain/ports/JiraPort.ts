import type { JiraIssue } from "../models/records/JiraIssue";
import type { DownloadOutcome } from "../../utils/download";

export interface JiraPort {
  /** Every issue matching `jql`, one page at a time, in server order. */
  searchIssues(jql: string, fields?: string[]): AsyncIterable<JiraIssue>;
  getIssue(issueKey: string, fields?: string[]): Promise<JiraIssue>;
  updateIssueLabels(issueKey: string, labels: string[]): Promise<void>;
  downloadAttachment(contentUrl: string, destPath: string): Promise<DownloadOutcome>;
}
