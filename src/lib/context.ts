/**
 * What every command receives from cli.ts instead of reaching for globals.
 */

import { DbtRunner } from "./dbt.js";
import type { Fetcher } from "./hub.js";
import type { Logger } from "./logger.js";
import { TerminalPrompter, isInteractive, type Prompter } from "./prompts.js";
import { cacheFilePath } from "./cache.js";
import { SETTING_ENV } from "./settings.js";

export interface CommandContext {
  logger: Logger;
  env: NodeJS.ProcessEnv;
  cwd: string;
  cacheFile: string;
  runner: DbtRunner;
  fetcher: Fetcher;
  /** Undefined when stdin/stdout are not a terminal; wizards are then unavailable. */
  openPrompter?: () => Prompter;
}

export function createContext(logger: Logger, env: NodeJS.ProcessEnv = process.env): CommandContext {
  return {
    logger,
    env,
    cwd: process.cwd(),
    cacheFile: cacheFilePath(env),
    runner: new DbtRunner({ bin: env[SETTING_ENV.dbtBin], logger }),
    fetcher: fetch,
    openPrompter: isInteractive() ? () => new TerminalPrompter() : undefined,
  };
}
