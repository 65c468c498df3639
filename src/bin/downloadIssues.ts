#!/usr/bin/env tsx
import { hideBin } from "yargs/helpers";
import yargs from "yargs";
import { JiraAdapter } from "../adapters/jira/JiraAdapter";
import { JiraClient } from "../adapters/jira/JiraClient";
import { IssueDownloadService } from "../domain/services/IssueDownloadService";
import { OUTPUT_FORMATS, type OutputFormat } from "../domain/models/ConfigModels";
import { DEFAULT_CONFIG_FILE, loadConfig } from "../config";
import { ConfigError, exitWithError } from "../errors";

const DEFAULT_FORMAT: OutputFormat = "text";

const argv = yargs(hideBin(process.argv))
  .scriptName("download-issues")
  .usage("$0 [options]\n\nDownload Jira issues")
  .option("atlassian-domain", {
    type: "string",
    describe:
      "Atlassian domain from which the Jira issues are to be downloaded. " +
      "Defaults to 'domain' from the DEFAULT section of the configuration file.",
  })
  .option("config-file", {
    type: "string",
    default: DEFAULT_CONFIG_FILE,
    describe: "INI configuration file with Atlassian credentials",
  })
  .option("dest-dir", {
    type: "string",
    default: "issues",
    describe: "Output directory where the issues will be saved",
  })
  .option("jql", {
    type: "string",
    describe:
      "JQL query to find issues. " +
      "Defaults to 'jql' from the DEFAULT section of the configuration file.",
  })
  .option("format", {
    alias: "f",
    choices: OUTPUT_FORMATS,
    default: DEFAULT_FORMAT,
    describe: "Output format",
  })
  .option("download-attachments", {
    alias: "d",
    type: "boolean",
    default: false,
    describe: "Download and store attachments",
  })
  .strict()
  .help()
  .parseSync();

async function main() {
  const config = loadConfig({
    configFile: argv["config-file"],
    domain: argv["atlassian-domain"],
    jql: argv.jql,
  });
  if (!config.jql) {
    throw new ConfigError("no JQL query specified (use --jql or set 'jql' in DEFAULT)");
  }

  console.log(`Atlassian domain: ${config.domain}`);
  console.log(`Atlassian user: ${config.user}`);
  console.log(`Output issues to the directory: ${argv["dest-dir"]}`);
  console.log(`Output format: ${argv.format}`);
  console.log(`JQL: ${config.jql}`);

  const jira = new JiraAdapter(new JiraClient(config), { progress: true });
  const downloader = new IssueDownloadService(jira, {
    domain: config.domain,
    destDir: argv["dest-dir"],
    format: argv.format,
    downloadAttachments: argv["download-attachments"],
  });
  await downloader.downloadIssuesByQuery(config.jql);
}

main().catch(exitWithError);
