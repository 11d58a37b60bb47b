/**
 * Shared CLI output helpers — JSON mode and error exits.
 */

import { CoreError, USAGE_EXIT_CODE } from "./errors.js";
import { UsageError } from "./args.js";

let jsonMode = false;

export function setJsonMode(on: boolean): void {
  jsonMode = on;
}

export function isJsonMode(): boolean {
  return jsonMode;
}

export function output(data: unknown): void {
  if (typeof data === "string" && !jsonMode) {
    console.log(data);
  } else {
    console.log(JSON.stringify(data, null, 2));
  }
}

export function die(msg: string, code = 1, errorCode?: string): never {
  if (jsonMode) {
    console.log(JSON.stringify(errorCode ? { error: errorCode, message: msg } : { error: msg }));
  } else {
    console.error(`Error: ${msg}`);
  }
  process.exit(code);
}

/** Exit code for anything thrown out of a command. */
export function exitCodeFor(err: unknown): number {
  if (err instanceof CoreError) return err.exitCode;
  if (err instanceof UsageError) return USAGE_EXIT_CODE;
  return 1;
}

/** Report a thrown error and exit with its code. Unknown errors are fatal. */
export function fail(err: unknown): never {
  if (err instanceof CoreError) die(err.message, err.exitCode, err.code);
  if (err instanceof UsageError) die(err.message, USAGE_EXIT_CODE, "usage");
  const msg = err instanceof Error ? err.message : String(err);
  if (jsonMode) {
    console.log(JSON.stringify({ error: "fatal", message: msg }));
  } else {
    console.error(`Fatal: ${msg}`);
  }
  process.exit(1);
}
