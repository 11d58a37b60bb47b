/**
 * Options that come before the command: `dbtkit --log-level debug dbt run`.
 *
 * Only the leading run of flags is read, so flags meant for dbt are never
 * taken out of a passthrough command line.
 */

import { UsageError, parseFlags, type FlagSpec } from "./args.js";
import { DEFAULT_LOG_LEVEL, Logger, isLogLevel, type LogSink } from "./logger.js";
import { SETTING_ENV, expandHome, resolveSetting } from "./settings.js";

export const GLOBAL_FLAGS: readonly FlagSpec[] = [
  { name: "log-level", type: "string" },
  { name: "log-path", type: "string" },
  { name: "json-log", type: "boolean" },
  { name: "json", type: "boolean" },
  { name: "version", alias: "v", type: "boolean" },
  { name: "help", alias: "h", type: "boolean" },
  { name: "show-completion", type: "string" },
  { name: "install-completion", type: "string" },
];

export interface GlobalOptions {
  logLevel?: string;
  logPath?: string;
  jsonLog: boolean;
  json: boolean;
  version: boolean;
  help: boolean;
  showCompletion?: string;
  installCompletion?: string;
}

/** Split argv into the leading global flags and the command that follows. */
export function parseGlobalOptions(argv: readonly string[]): { options: GlobalOptions; rest: string[] } {
  const valued = new Set(
    GLOBAL_FLAGS.filter((f) => f.type === "string").flatMap((f) => (f.alias ? [`--${f.name}`, `-${f.alias}`] : [`--${f.name}`])),
  );
  let end = 0;
  while (end < argv.length && argv[end].startsWith("-")) {
    end += valued.has(argv[end]) ? 2 : 1;
  }
  end = Math.min(end, argv.length);

  const flags = parseFlags(argv.slice(0, end), GLOBAL_FLAGS);
  return {
    options: {
      logLevel: flags.string("log-level"),
      logPath: flags.string("log-path"),
      jsonLog: flags.boolean("json-log") ?? false,
      json: flags.boolean("json") ?? false,
      version: flags.boolean("version") ?? false,
      help: flags.boolean("help") ?? false,
      showCompletion: flags.string("show-completion"),
      installCompletion: flags.string("install-completion"),
    },
    rest: argv.slice(end),
  };
}

/** "1", "true", "yes" and "on" turn a boolean env variable on. */
export function envFlag(value: string | undefined): boolean {
  return value !== undefined && ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

export function createLogger(options: GlobalOptions, env: NodeJS.ProcessEnv, stream?: LogSink): Logger {
  const level = resolveSetting<string>({
    explicit: options.logLevel,
    env: env[SETTING_ENV.logLevel],
    fallback: DEFAULT_LOG_LEVEL,
  });
  const normalized = level.value.toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new UsageError(`Invalid log level '${level.value}' (from ${level.source}); expected debug, info, warn or error`);
  }
  const file = resolveSetting<string | undefined>({
    explicit: options.logPath,
    env: env[SETTING_ENV.logPath],
    fallback: undefined,
  }).value;

  return new Logger({
    level: normalized,
    file: file === undefined ? undefined : expandHome(file),
    json: options.jsonLog || envFlag(env[SETTING_ENV.logJson]),
    stream,
  });
}
