import axios, {
  type AxiosInstance,
  type CreateAxiosDefaults,
  isAxiosError,
} from "axios";
import type { AtlassianConfig } from "../../domain/models/ConfigModels";
import {
  ALL_FIELDS,
  type JiraIssueData,
  type JiraSearchResults,
  type RestData,
  isJiraIssueData,
} from "../../domain/models/JiraClientModels";
import { JiraRequestError } from "../../errors";
import {
  type DownloadOptions,
  type DownloadOutcome,
  downloadFile,
} from "../../utils/download";
import { paginate } from "../../utils/paginate";

/** Thin wrapper over the Jira Cloud REST API v2; returns raw JSON. */
export class JiraClient {
  private client: AxiosInstance;

  constructor(
    private config: AtlassianConfig,
    http: CreateAxiosDefaults = {}
  ) {
    this.client = axios.create({
      baseURL: `${config.baseUrl}/rest/api/2`,
      auth: { username: config.user, password: config.token },
      headers: { Accept: "application/json" },
      ...http,
    });
  }

  /** Lazily walk every page of a JQL search. */
  searchIssues(
    jql: string,
    fields: string[] = ALL_FIELDS
  ): AsyncGenerator<JiraIssueData> {
    return paginate(
      (startAt, maxResults) =>
        this.searchPage(jql, startAt, maxResults, fields),
      this.config.pageSize
    );
  }

  async searchPage(
    jql: string,
    startAt: number,
    maxResults: number,
    fields: string[] = ALL_FIELDS
  ): Promise<JiraIssueData[]> {
    const data = await this.call("GET", "/search", () =>
      this.client.get<JiraSearchResults>("/search", {
        params: { jql, startAt, maxResults, fields: fields.join(",") },
      })
    );
    if (!Array.isArray(data.issues)) {
      throw new JiraRequestError(
        "GET /search returned no issue list",
        "GET",
        "/search"
      );
    }
    return data.issues;
  }

  async fetchIssue(
    issueKey: string,
    fields: string[] = ALL_FIELDS
  ): Promise<JiraIssueData> {
    const path = `/issue/${encodeURIComponent(issueKey)}`;
    const data = await this.call("GET", path, () =>
      this.client.get<unknown>(path, {
        params: { fields: fields.join(",") },
      })
    );
    if (!isJiraIssueData(data)) {
      throw new JiraRequestError(`GET ${path} returned no issue key`, "GET", path);
    }
    return data;
  }

  async updateIssueFields(issueKey: string, fields: RestData): Promise<void> {
    const path = `/issue/${encodeURIComponent(issueKey)}`;
    await this.call("PUT", path, () => this.client.put<unknown>(path, { fields }));
  }

  async downloadAttachment(
    url: string,
    destPath: string,
    options?: DownloadOptions
  ): Promise<DownloadOutcome> {
    try {
      return await downloadFile(this.client, url, destPath, options);
    } catch (err) {
      if (isAxiosError(err)) throw JiraRequestError.from(err, "GET", url);
      throw err;
    }
  }

  private async call<T>(
    method: string,
    path: string,
    send: () => Promise<{ data: T }>
  ): Promise<T> {
    try {
      const res = await send();
      return res.data;
    } catch (err) {
      throw JiraRequestError.from(err, method, path);
    }
  }
}
