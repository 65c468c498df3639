export interface AtlassianConfig {
  /** Host name of the Atlassian site, e.g. `example.atlassian.net`. */
  domain: string;
  baseUrl: string;
  user: string;
  token: string;
  /** Default query from the `[DEFAULT]` section, if any. */
  jql?: string;
  pageSize: number;
}

export interface ConfigOptions {
  configFile: string;
  domain?: string;
  jql?: string;
}

export type OutputFormat = "yaml" | "text";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["yaml", "text"];
