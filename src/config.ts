import dotenv from "dotenv";
dotenv.config();

import { existsSync, readFileSync } from "node:fs";
import ini from "ini";

import type { AtlassianConfig, ConfigOptions } from "./domain/models/ConfigModels";
import { type RestData, isRestData } from "./domain/models/JiraClientModels";
import { ConfigError } from "./errors";

export const DEFAULT_CONFIG_FILE = "config.ini";
export const PAGE_SIZE = 200;

const DEFAULT_SECTION = "DEFAULT";

type Env = Record<string, string | undefined>;

/**
 * `ini` turns `[example.atlassian.net]` into nested objects, so a dotted
 * section name is looked up one segment at a time.
 */
function sectionAt(parsed: RestData, name: string): RestData | undefined {
  const direct = parsed[name];
  if (isRestData(direct)) return direct;

  let node: unknown = parsed;
  for (const part of name.split(".")) {
    if (!isRestData(node)) return undefined;
    node = node[part];
  }
  return isRestData(node) ? node : undefined;
}

const ENTRY = /^\s*([^=\s;#[][^=]*?)\s*=\s*(.*?)\s*$/;
const COMMENT_MARKER = /(^|[^\\])[;#]/;

const isQuoted = (value: string) =>
  value.length > 1 &&
  (value.startsWith("'") || value.startsWith('"')) &&
  value.endsWith(value[0]);

/**
 * `ini` ends an unquoted value at `;` or `#`, where configparser keeps the
 * rest of the line. Returns the first key whose value would be cut short.
 */
function truncatedKey(text: string): string | undefined {
  for (const line of text.split(/\r?\n/)) {
    const match = ENTRY.exec(line);
    if (!match) continue;
    const [, key, value] = match;
    if (!isQuoted(value) && COMMENT_MARKER.test(value)) return key;
  }
  return undefined;
}

/** Section value, falling back to `[DEFAULT]` the way Python's configparser does. */
function setting(
  section: RestData,
  defaults: RestData,
  key: string
): string | undefined {
  const value = section[key] ?? defaults[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Read the Atlassian site and credentials from an INI file:
 *
 * ```ini
 * [DEFAULT]
 * domain = example.atlassian.net
 * jql = project = DEMO
 *
 * [example.atlassian.net]
 * user = someone@example.com
 * api_token = ...
 * ```
 *
 * `ATLASSIAN_USER` and `ATLASSIAN_API_TOKEN` take precedence over the file.
 */
export function loadConfig(
  options: ConfigOptions,
  env: Env = process.env
): AtlassianConfig {
  const file = options.configFile;
  if (!existsSync(file)) {
    throw new ConfigError(`Configuration file ${file} not found`);
  }

  const text = readFileSync(file, "utf-8");
  const truncated = truncatedKey(text);
  if (truncated) {
    throw new ConfigError(
      `Value of ${truncated} in configuration file ${file} contains ';' or '#'; wrap it in single quotes`
    );
  }

  const parsed: RestData = ini.parse(text);
  const defaults = sectionAt(parsed, DEFAULT_SECTION) ?? {};

  const domain = options.domain || setting({}, defaults, "domain");
  if (!domain) {
    throw new ConfigError(`domain is not specified in configuration file ${file}`);
  }

  const section = sectionAt(parsed, domain) ?? {};
  const user = env.ATLASSIAN_USER || setting(section, defaults, "user");
  if (!user) {
    throw new ConfigError(`user is not specified in configuration file ${file}`);
  }
  const token =
    env.ATLASSIAN_API_TOKEN || setting(section, defaults, "api_token");
  if (!token) {
    throw new ConfigError(
      `api_token is not specified in configuration file ${file}`
    );
  }

  return {
    domain,
    baseUrl: `https://${domain.replace(/\/+$/, "")}`,
    user,
    token,
    jql: options.jql || setting({}, defaults, "jql"),
    pageSize: PAGE_SIZE,
  };
}
