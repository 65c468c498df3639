/** Any JSON object as returned by the Jira REST API. */
export type RestData = Record<string, unknown>;

export interface JiraIssueData {
  id?: string;
  key: string;
  self?: string;
  fields?: RestData;
  [extra: string]: unknown;
}

export interface JiraSearchResults {
  startAt: number;
  maxResults: number;
  total: number;
  issues: JiraIssueData[];
}

/** `fields` query value meaning "every navigable and non-navigable field". */
export const ALL_FIELDS = ["*all"];

export function isRestData(value: unknown): value is RestData {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isJiraIssueData(value: unknown): value is JiraIssueData {
  return isRestData(value) && typeof value.key === "string";
}
