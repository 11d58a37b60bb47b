/**
 * `dbtkit dbt` — profile and project management; every other subcommand is
 * handed to dbt itself in the resolved project directory.
 */

import * as path from "path";
import type { CommandContext } from "../lib/context.js";
import { NotFoundError } from "../lib/errors.js";
import { resolveProfilePath, resolveProjectDir } from "../lib/settings.js";
import { profileCommand } from "./profile.js";
import { projectCommand } from "./project.js";

/** Exit code for the process: dbt's own for passthrough, 0 otherwise. */
export async function dbtCommand(sub: string | undefined, rest: string[], ctx: CommandContext): Promise<number> {
  switch (sub) {
    case "profile":
      await profileCommand(rest[0], rest.slice(1), ctx);
      return 0;

    case "project":
      await projectCommand(rest[0], rest.slice(1), ctx);
      return 0;

    case undefined:
    case "help":
    case "--help":
    case "-h":
      printDbtHelp();
      return 0;

    default:
      return passthrough([sub, ...rest], ctx);
  }
}

/**
 * Directory dbt runs in. The remembered project is not used here: outside
 * any project dbt gets the working directory, so `dbt init` lands where the
 * user is.
 */
export async function passthroughDir(ctx: CommandContext): Promise<string> {
  try {
    const resolved = await resolveProjectDir({ env: ctx.env, cache: {}, cwd: ctx.cwd });
    return resolved.value;
  } catch (err) {
    if (!(err instanceof NotFoundError)) throw err;
    ctx.logger.info("no dbt project found, running dbt in the working directory", { cwd: ctx.cwd });
    return ctx.cwd;
  }
}

export async function passthrough(args: string[], ctx: CommandContext): Promise<number> {
  const cwd = await passthroughDir(ctx);
  const profileFile = resolveProfilePath(undefined, ctx.env).value;
  return ctx.runner.run(args, { cwd, env: ctx.env, profilesDir: path.dirname(profileFile) });
}

function printDbtHelp(): void {
  console.log(`Usage: dbtkit dbt <command> [args...]

Commands:
  profile init|show|edit     Manage profiles.yml
  project init|show|edit     Manage dbt_project.yml and packages.yml
  <anything else>            Run dbt with the given arguments in the project directory
                             e.g. dbtkit dbt run --select my_model

Run 'dbtkit dbt profile --help' or 'dbtkit dbt project --help' for details.`);
}
