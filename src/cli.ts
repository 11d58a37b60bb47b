#!/usr/bin/env node

/**
 * CLI entry point for dbtkit.
 * Thin dispatcher — each subcommand lives in commands/.
 *
 * Usage:  dbtkit [global options] <command> [subcommand] [args...]
 */

import { completionScript, completionsCommand, installCompletion, parseShell } from "./commands/completions.js";
import { dbtCommand } from "./commands/dbt.js";
import { UsageError } from "./lib/args.js";
import { createContext } from "./lib/context.js";
import { createLogger, envFlag, parseGlobalOptions } from "./lib/global-options.js";
import { fail, isJsonMode, output, setJsonMode } from "./lib/output.js";
import { SETTING_ENV } from "./lib/settings.js";
import { checkForUpdate, type VersionCheck } from "./lib/version-check.js";

const VERSION = "0.4.0";

// ── dispatch ─────────────────────────────────────────────────────────

async function main(argv: string[]): Promise<number> {
  const { options, rest } = parseGlobalOptions(argv);
  setJsonMode(options.json);

  if (options.version) {
    output(isJsonMode() ? { version: VERSION } : `dbtkit ${VERSION}`);
    return 0;
  }
  if (options.showCompletion !== undefined) {
    console.log(completionScript(parseShell(options.showCompletion)));
    return 0;
  }
  if (options.installCompletion !== undefined) {
    const result = await installCompletion(parseShell(options.installCompletion));
    if (isJsonMode()) output(result);
    else console.log(result.changed ? `✓ Completion installed in ${result.file}` : `Completion already installed in ${result.file}`);
    return 0;
  }

  const logger = createLogger(options, process.env);
  const ctx = createContext(logger);
  const [cmd, sub, ...args] = rest;

  // Started before the command and never awaited past it; process.exit ends it.
  const updateCheck: Promise<VersionCheck> = envFlag(process.env[SETTING_ENV.noUpdateCheck]) || options.help
    ? Promise.resolve({})
    : checkForUpdate({ currentVersion: VERSION, cacheFile: ctx.cacheFile, logger, fetcher: ctx.fetcher }).catch(
        (err: unknown) => {
          logger.debug("version check skipped", { reason: err instanceof Error ? err.message : String(err) });
          return {};
        },
      );

  let code = 0;
  switch (options.help ? "help" : cmd) {
    case "dbt":
      code = await dbtCommand(sub, args, ctx);
      break;

    case "completions":
      await completionsCommand(sub, args);
      break;

    case "version":
      output(isJsonMode() ? { version: VERSION } : `dbtkit ${VERSION}`);
      break;

    case "help":
    case undefined:
      printHelp();
      break;

    default:
      throw new UsageError(`Unknown command: ${cmd}\nRun with --help for usage.`);
  }

  const { newerVersion } = await updateCheck;
  if (newerVersion && !isJsonMode()) {
    console.error(`\nA newer dbtkit is available: ${newerVersion} (you have ${VERSION})`);
  }
  return code;
}

// ── help ─────────────────────────────────────────────────────────────

function printHelp(): void {
  console.log(`
dbtkit — scaffold and edit dbt profiles and projects  (v${VERSION})

Usage: dbtkit [options] <command> [subcommand] [args...]

Getting started:
  1. dbtkit dbt profile init            Write a starter ~/.dbt/profiles.yml
  2. dbtkit dbt project init            Create a project (interactive)
  3. dbtkit dbt run                     Anything else goes straight to dbt

Profiles — ~/.dbt/profiles.yml:
  dbt profile init [--force]            Starter profile with a DuckDB dev output
  dbt profile show                      Print path and contents
  dbt profile edit [--action A ...]     Edit profiles and outputs

Projects — dbt_project.yml and packages.yml:
  dbt project init [-n NAME -p PROFILE] Create a project
  dbt project show                      Summarise the current project
  dbt project edit [--action A ...]     Edit settings, paths and packages

Other:
  dbt <args...>                         Run dbt in the project directory
  completions <bash|zsh|fish>           Print a shell completion script
  version                               Print version
  help                                  This message

Options (before the command):
  --log-level LEVEL            debug, info, warn (default) or error
  --log-path FILE              Also append log records to FILE
  --json-log                   Log records as JSON lines
  --json                       Machine-readable JSON output
  --version, -v                Print version
  --show-completion SHELL      Print the completion script for SHELL
  --install-completion SHELL   Install completion for SHELL

Environment variables:
  ${SETTING_ENV.profilePath.padEnd(27)}profiles.yml location (default ~/.dbt/profiles.yml)
  ${SETTING_ENV.projectPath.padEnd(27)}Project directory for show, edit and passthrough
  ${SETTING_ENV.projectBaseDir.padEnd(27)}Where project init creates projects
  ${SETTING_ENV.logLevel.padEnd(27)}Same as --log-level
  ${SETTING_ENV.logPath.padEnd(27)}Same as --log-path
  ${SETTING_ENV.logJson.padEnd(27)}Same as --json-log
  ${SETTING_ENV.cacheDir.padEnd(27)}Cache directory (default ~/.cache/dbtkit)
  ${SETTING_ENV.noUpdateCheck.padEnd(27)}Skip the newer-version check
  ${SETTING_ENV.dbtBin.padEnd(27)}dbt executable (default dbt)
`);
}

// ── run ──────────────────────────────────────────────────────────────

main(process.argv.slice(2)).then((code) => process.exit(code), fail);
