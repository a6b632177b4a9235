#!/usr/bin/env node
/**
 * collection-report CLI entry point.
 *
 * Usage:
 *   collection-report <command> [options]
 *
 * Commands:
 *   report <projectId> [options]  Build (and upload) the project's collection report
 *   config show [--json]          Show resolved configuration
 */

import { errorMessage } from "../errors.js";
import { parseArgs } from "./args.js";
import { cmdConfigShow, cmdReport } from "./commands.js";
import { resolveConfig, type CliConfig } from "./config.js";

// ---------------------------------------------------------------------------
// Usage
// ---------------------------------------------------------------------------

const USAGE = `collection-report: per-session collection report

Usage:
  collection-report report <projectId> [options]
  collection-report config show [--json]

Report options:
  --schema <file>               JSON Schema for stat documents
  --demographics <file>         { pattern, attributes } demographics rules
  --script-categories <file>    [{ title, rules }] script number categories
  --substitutions <file>        { column: { value: replacement } }
  --exclude-corpus-codes <file> corpus codes skipped by stat checks
  --photo-prompts <file>        { corpusCode: promptName } for photo columns
  --countries <format>          alpha_2 | alpha_3 | full_name
  --prompt-attributes <a,b>     prompt attribute keys to copy
  --language-columns <a,b>      columns holding ISO 639-3 language codes
  --report-name <name>          override the report file name
  --workers <n>                 worker pool size
  --inputs                      add columns for input prompt answers
  --bluetooth                   add bluetooth device columns
  --median-stats                add per-session median stat columns
  --from-scratch                ignore the previous report
  --no-upload                   do not upload the report
  --json                        print the run summary as JSON

Environment:
  COLLECTION_REPORT_DB_PATH            Override SQLite record store path
  COLLECTION_REPORT_UPLOAD_REMOTE      rclone remote (default "report:")
  COLLECTION_REPORT_UPLOAD_DIR         Upload directory (default "/Data Collection")
  COLLECTION_REPORT_GEO_ENDPOINT       IP geolocation endpoint
  COLLECTION_REPORT_STAT_PATH_REWRITE  "from=to" rewrite for stat lookups
  COLLECTION_REPORT_WORKERS            Default worker pool size
`;

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<number> {
  const raw = process.argv.slice(2);
  if (raw.length === 0) {
    process.stderr.write(USAGE);
    return 1;
  }

  const { positional, flags, boolFlags } = parseArgs(raw);
  const json = boolFlags.has("json");

  // Handle help flags before command dispatch
  if (boolFlags.has("help") || boolFlags.has("h") || positional[0] === "help") {
    process.stdout.write(USAGE);
    return 0;
  }

  let config: CliConfig;
  try {
    config = resolveConfig();
  } catch (e: unknown) {
    process.stderr.write(`error: ${errorMessage(e)}\n`);
    return 1;
  }

  const command = positional[0];

  switch (command) {
    case "report":
      return cmdReport(positional, flags, boolFlags, config, json);

    case "config":
      if (positional[1] === "show") {
        return cmdConfigShow(config, json);
      }
      process.stderr.write("Unknown config subcommand. Use: config show\n");
      return 1;

    default:
      process.stderr.write(`Unknown command: ${command}\n\n${USAGE}`);
      return 1;
  }
}

main().then(
  (code) => process.exit(code),
  (e: unknown) => {
    process.stderr.write(`Fatal: ${errorMessage(e)}\n`);
    process.exit(2);
  },
);
