import { mkdir, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { ISSUE_RENDERERS } from "../../formats/renderers";
import type { OutputFormat } from "../models/ConfigModels";
import { FieldValue } from "../models/FieldValue";
import type { JiraIssue } from "../models/records/JiraIssue";
import type { DownloadResult } from "../models/RunResults";
import type { JiraPort } from "../ports/JiraPort";

export interface IssueDownloadOptions {
  /** Atlassian site, used to build the browse links. */
  domain: string;
  destDir: string;
  format: OutputFormat;
  downloadAttachments: boolean;
}

export class IssueDownloadService {
  constructor(
    private jira: JiraPort,
    private opts: IssueDownloadOptions
  ) {}

  browseUrl(issueKey: string): string {
    return `https://${this.opts.domain}/browse/${issueKey}`;
  }

  /**
   * Write every issue matching `jql` to its own file, one issue at a time,
   * fetching the next page only once the current issue is on disk.
   */
  async downloadIssuesByQuery(jql: string): Promise<DownloadResult> {
    await mkdir(this.opts.destDir, { recursive: true });

    const result: DownloadResult = {
      issues: 0,
      attachments: 0,
      skippedAttachments: 0,
    };
    for await (const issue of this.jira.searchIssues(jql)) {
      result.issues++;
      await this.writeIssue(issue);
      if (this.opts.downloadAttachments) {
        await this.downloadAttachments(issue, result);
      }
    }

    console.log(`Downloaded ${result.issues} issues`);
    return result;
  }

  async writeIssue(issue: JiraIssue): Promise<string> {
    const comments = issue.comments;
    if (FieldValue.hasData(comments) && !comments.value.isComplete) {
      console.log(
        `Need to download comments: total = ${comments.value.total}, have = ${comments.value.length}`
      );
    }

    const renderer = ISSUE_RENDERERS[this.opts.format];
    const path = join(this.opts.destDir, `${issue.key}.${renderer.extension}`);
    console.log(`issue ${issue.key} -> ${path}`);
    await writeFile(path, renderer.render(issue, this.browseUrl(issue.key)), "utf-8");
    return path;
  }

  private async downloadAttachments(
    issue: JiraIssue,
    result: DownloadResult
  ): Promise<void> {
    const issueDir = join(this.opts.destDir, issue.key);
    await mkdir(issueDir, { recursive: true });

    for (const attachment of FieldValue.valueOr(issue.attachments, [])) {
      const url = attachment.content;
      const filename = attachment.filename;
      if (!url || !filename) {
        console.warn(
          `Skipping attachment ${attachment.id ?? "?"} of ${issue.key}: no content URL or filename`
        );
        continue;
      }
      const outcome = await this.jira.downloadAttachment(
        url,
        join(issueDir, basename(filename))
      );
      if (outcome.status === "skipped") result.skippedAttachments++;
      else result.attachments++;
    }
  }
}
