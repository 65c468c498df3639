#!/usr/bin/env tsx
import { hideBin } from "yargs/helpers";
import yargs from "yargs";
import { JiraAdapter } from "../adapters/jira/JiraAdapter";
import { JiraClient } from "../adapters/jira/JiraClient";
import { LabelEditService } from "../domain/services/LabelEditService";
import { DEFAULT_CONFIG_FILE, loadConfig } from "../config";
import { exitWithError } from "../errors";

const argv = yargs(hideBin(process.argv))
  .scriptName("edit-labels")
  .usage("$0 [options]\n\nAdd labels to and remove labels from Jira issues")
  .option("dry-run", {
    alias: "n",
    type: "boolean",
    default: false,
    describe: "Perform a trial run with no changes made",
  })
  .option("atlassian-domain", {
    type: "string",
    describe:
      "Atlassian domain on which the Jira issues will be labeled. " +
      "Defaults to 'domain' from the DEFAULT section of the configuration file.",
  })
  .option("config-file", {
    type: "string",
    default: DEFAULT_CONFIG_FILE,
    describe: "INI configuration file with Atlassian credentials",
  })
  .option("jql", {
    type: "string",
    describe: "JQL query to find issues",
  })
  .option("key", {
    type: "string",
    array: true,
    describe: "Jira issue key(s)",
  })
  .option("add", {
    type: "string",
    array: true,
    describe: "Label(s) to add",
  })
  .option("remove", {
    type: "string",
    array: true,
    describe: "Label(s) to remove",
  })
  .strict()
  .help()
  .parseSync();

function describeList(values: string[], label: string, none: string): string {
  return values.length > 0 ? `${label}: ${values.join(", ")}` : none;
}

async function main() {
  const keys = argv.key ?? [];
  const add = argv.add ?? [];
  const remove = argv.remove ?? [];
  const jql = argv.jql;

  const config = loadConfig({
    configFile: argv["config-file"],
    domain: argv["atlassian-domain"],
  });

  console.log(jql ? `JQL: ${jql}` : "No JQL specified");
  console.log(describeList(keys, "Jira keys", "No Jira keys specified"));
  console.log(describeList(add, "Add labels", "There are no labels to add"));
  console.log(
    describeList(remove, "Remove labels", "There are no labels to remove")
  );

  const jira = new JiraAdapter(new JiraClient(config));
  const editor = new LabelEditService(jira, { dryRun: argv["dry-run"] });
  await editor.editLabels({ keys, jql, add, remove });
}

main().catch(exitWithError);
