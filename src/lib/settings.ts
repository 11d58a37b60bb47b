/**
 * Setting resolution — explicit flag > environment > cache > default.
 *
 * The env variables dbtkit reads are listed in SETTING_ENV so help text and
 * `resolveSettings` stay in sync.
 */

import * as os from "os";
import * as path from "path";
import { PROJECT_FILE, fileExists } from "./documents.js";
import { NotFoundError } from "./errors.js";
import { findProjectFile } from "./finder.js";
import { freshProjectPath, type CacheRecord } from "./cache.js";

export type SettingSource = "explicit" | "env" | "cache" | "default";

export interface Resolved<T> {
  value: T;
  source: SettingSource;
}

export interface SettingCandidates<T> {
  explicit?: T;
  env?: T;
  cached?: T;
  fallback: T;
}

export const SETTING_ENV = {
  profilePath: "DBTKIT_PROFILE_PATH",
  projectPath: "DBTKIT_PROJECT_PATH",
  projectBaseDir: "DBTKIT_PROJECT_BASE_DIR",
  logLevel: "DBTKIT_LOG_LEVEL",
  logPath: "DBTKIT_LOG_PATH",
  logJson: "DBTKIT_LOG_JSON",
  cacheDir: "DBTKIT_CACHE_DIR",
  noUpdateCheck: "DBTKIT_NO_UPDATE_CHECK",
  dbtBin: "DBTKIT_DBT_BIN",
} as const;

/** Empty strings count as unset, matching how shells clear a variable. */
function present<T>(value: T | undefined): value is T {
  return value !== undefined && value !== "";
}

export function resolveSetting<T>(candidates: SettingCandidates<T>): Resolved<T> {
  if (present(candidates.explicit)) return { value: candidates.explicit, source: "explicit" };
  if (present(candidates.env)) return { value: candidates.env, source: "env" };
  if (present(candidates.cached)) return { value: candidates.cached, source: "cache" };
  return { value: candidates.fallback, source: "default" };
}

export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export function defaultProfilePath(): string {
  return path.join(os.homedir(), ".dbt", "profiles.yml");
}

export function resolveProfilePath(explicit: string | undefined, env: NodeJS.ProcessEnv): Resolved<string> {
  const resolved = resolveSetting({
    explicit,
    env: env[SETTING_ENV.profilePath],
    fallback: defaultProfilePath(),
  });
  return { ...resolved, value: path.resolve(expandHome(resolved.value)) };
}

export function resolveProjectBaseDir(explicit: string | undefined, env: NodeJS.ProcessEnv, cwd: string): Resolved<string> {
  const resolved = resolveSetting({ explicit, env: env[SETTING_ENV.projectBaseDir], fallback: cwd });
  return { ...resolved, value: path.resolve(cwd, expandHome(resolved.value)) };
}

/** `explicit` and env values may name the project directory or its dbt_project.yml. */
function asProjectDir(p: string, cwd: string): string {
  const abs = path.resolve(cwd, expandHome(p));
  return path.basename(abs) === PROJECT_FILE ? path.dirname(abs) : abs;
}

export interface ProjectDirInputs {
  explicit?: string;
  env: NodeJS.ProcessEnv;
  cache: CacheRecord;
  cwd: string;
  now?: Date;
}

/**
 * Project directory for `project show/edit`. An explicit path or
 * DBTKIT_PROJECT_PATH wins; otherwise the nearest project at or above `cwd`.
 * The cached path is consulted only when `cwd` is in no project, and only
 * while fresh and still holding a dbt_project.yml.
 */
export async function resolveProjectDir(inputs: ProjectDirInputs): Promise<Resolved<string>> {
  const { explicit, env, cwd } = inputs;
  const chosen = resolveSetting<string | undefined>({
    explicit,
    env: env[SETTING_ENV.projectPath],
    fallback: undefined,
  });
  if (chosen.value !== undefined) {
    return { value: asProjectDir(chosen.value, cwd), source: chosen.source };
  }
  try {
    const file = await findProjectFile(cwd);
    return { value: path.dirname(file), source: "default" };
  } catch (err) {
    if (!(err instanceof NotFoundError)) throw err;
    const cached = freshProjectPath(inputs.cache, inputs.now);
    if (cached === undefined || !(await fileExists(path.join(cached, PROJECT_FILE)))) throw err;
    return { value: cached, source: "cache" };
  }
}
