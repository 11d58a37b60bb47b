/**
 * Passthrough to the dbt executable.
 *
 * Arguments go through untouched, stdio is inherited, and the child's exit
 * code comes back as-is. A signal-terminated child maps to 128 + signal
 * number, a spawn failure (dbt not installed) to 127.
 */

import { spawn, type SpawnOptions } from "child_process";
import type { EventEmitter } from "events";
import * as os from "os";
import type { Logger } from "./logger.js";

export const DEFAULT_DBT_BIN = "dbt";
export const SPAWN_FAILED_EXIT_CODE = 127;

export type ChildLike = Pick<EventEmitter, "on">;
export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildLike;

export interface DbtRunOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Directory holding profiles.yml, exported as DBT_PROFILES_DIR. */
  profilesDir?: string;
}

export function signalExitCode(signal: NodeJS.Signals): number {
  const num: number | undefined = os.constants.signals[signal];
  return 128 + (num ?? 0);
}

/** The user's own --profiles-dir or DBT_PROFILES_DIR wins over ours. */
export function childEnv(args: readonly string[], options: DbtRunOptions): NodeJS.ProcessEnv {
  const env = { ...options.env };
  const userChoice = args.some((a) => a === "--profiles-dir" || a.startsWith("--profiles-dir=")) || !!env.DBT_PROFILES_DIR;
  if (options.profilesDir && !userChoice) env.DBT_PROFILES_DIR = options.profilesDir;
  return env;
}

export class DbtRunner {
  readonly bin: string;
  private spawnFn: SpawnFn;
  private logger: Logger;

  constructor(options: { bin?: string; spawn?: SpawnFn; logger: Logger }) {
    this.bin = options.bin || DEFAULT_DBT_BIN;
    this.spawnFn = options.spawn ?? spawn;
    this.logger = options.logger;
  }

  run(args: string[], options: DbtRunOptions): Promise<number> {
    this.logger.debug(`running ${this.bin} ${args.join(" ")}`, { cwd: options.cwd });
    return new Promise((resolve) => {
      let settled = false;
      const settle = (code: number): void => {
        if (settled) return;
        settled = true;
        resolve(code);
      };

      let child: ChildLike;
      try {
        child = this.spawnFn(this.bin, args, {
          cwd: options.cwd,
          env: childEnv(args, options),
          stdio: "inherit",
        });
      } catch (err) {
        this.reportSpawnFailure(err);
        settle(SPAWN_FAILED_EXIT_CODE);
        return;
      }

      child.on("error", (err: unknown) => {
        this.reportSpawnFailure(err);
        settle(SPAWN_FAILED_EXIT_CODE);
      });
      child.on("exit", (code: number | null, signal: NodeJS.Signals | null) => {
        this.logger.debug(`${this.bin} exited`, { code, signal });
        if (code !== null) settle(code);
        else if (signal) settle(signalExitCode(signal));
        else settle(1);
      });
    });
  }

  private reportSpawnFailure(err: unknown): void {
    const reason = err instanceof Error ? err.message : String(err);
    console.error(`Error: could not run '${this.bin}': ${reason}`);
  }
}
