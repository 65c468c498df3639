import { JiraIssue } from "../../domain/models/records/JiraIssue";
import type { JiraPort } from "../../domain/ports/JiraPort";
import type { DownloadOutcome } from "../../utils/download";
import { JiraClient } from "./JiraClient";

export interface JiraAdapterOptions {
  /** Show a progress bar while attachments download. */
  progress?: boolean;
}

export class JiraAdapter implements JiraPort {
  constructor(
    private jiraClient: JiraClient,
    private options: JiraAdapterOptions = {}
  ) {}

  async *searchIssues(jql: string, fields?: string[]): AsyncGenerator<JiraIssue> {
    for await (const data of this.jiraClient.searchIssues(jql, fields)) {
      yield new JiraIssue(data);
    }
  }

  async getIssue(issueKey: string, fields?: string[]): Promise<JiraIssue> {
    return new JiraIssue(await this.jiraClient.fetchIssue(issueKey, fields));
  }

  async updateIssueLabels(issueKey: string, labels: string[]): Promise<void> {
    await this.jiraClient.updateIssueFields(issueKey, { labels });
  }

  async downloadAttachment(
    contentUrl: string,
    destPath: string
  ): Promise<DownloadOutcome> {
    return this.jiraClient.downloadAttachment(contentUrl, destPath, {
      progress: this.options.progress,
    });
  }
}
