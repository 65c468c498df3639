import { isAxiosError } from "axios";

/** Bad or missing configuration or command-line input. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** A Jira REST call that failed; the run is aborted. */
export class JiraRequestError extends Error {
  constructor(
    message: string,
    readonly method: string,
    readonly url: string,
    readonly status?: number
  ) {
    super(message);
    this.name = "JiraRequestError";
  }

  static from(err: unknown, method: string, url: string): JiraRequestError {
    if (isAxiosError(err)) {
      const status = err.response?.status;
      const reason = status
        ? `HTTP ${status} ${err.response?.statusText ?? ""}`.trim()
        : err.message;
      return new JiraRequestError(
        `${method} ${url} failed: ${reason}`,
        method,
        url,
        status
      );
    }
    const reason = err instanceof Error ? err.message : String(err);
    return new JiraRequestError(`${method} ${url} failed: ${reason}`, method, url);
  }
}

/** Report a fatal error on stderr and exit with status 1. */
export function exitWithError(err: unknown): never {
  if (err instanceof ConfigError || err instanceof JiraRequestError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
}
