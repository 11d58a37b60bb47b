/**
 * Small JSON cache shared between invocations: the last project dbtkit
 * worked on and the result of the last version check.
 *
 * Example (~/.cache/dbtkit/state.json):
 *   {
 *     "lastProjectPath": "/work/analytics",
 *     "lastProjectAt": "2026-01-05T09:12:00.000Z",
 *     "lastVersionCheck": "2026-01-05T09:12:01.000Z",
 *     "latestVersion": "0.5.0"
 *   }
 *
 * An unreadable or malformed cache is treated as empty.
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { z } from "zod";
import { writeFileAtomic } from "./atomic-write.js";

export const CACHE_FILE_NAME = "state.json";

/** A cached project path older than this is ignored. */
export const PROJECT_FRESHNESS_MS = 12 * 60 * 60 * 1000;

export const CacheRecord = z.object({
  lastProjectPath: z.string().optional(),
  lastProjectAt: z.string().datetime().optional(),
  lastVersionCheck: z.string().datetime().optional(),
  latestVersion: z.string().optional(),
});
export type CacheRecord = z.infer<typeof CacheRecord>;

export function defaultCacheDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.DBTKIT_CACHE_DIR || path.join(os.homedir(), ".cache", "dbtkit");
}

export function cacheFilePath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(defaultCacheDir(env), CACHE_FILE_NAME);
}

export async function readCache(file: string): Promise<CacheRecord> {
  try {
    const raw: unknown = JSON.parse(await fs.readFile(file, "utf-8"));
    const result = CacheRecord.safeParse(raw);
    return result.success ? result.data : {};
  } catch {
    return {};
  }
}

/** Merge `patch` into the stored record. */
export async function updateCache(file: string, patch: Partial<CacheRecord>): Promise<CacheRecord> {
  const next = { ...(await readCache(file)), ...patch };
  await writeFileAtomic(file, JSON.stringify(next, null, 2) + "\n");
  return next;
}

export async function rememberProject(file: string, projectDir: string, now: Date = new Date()): Promise<void> {
  await updateCache(file, { lastProjectPath: projectDir, lastProjectAt: now.toISOString() });
}

/** The cached project path, if recorded within the freshness window. */
export function freshProjectPath(cache: CacheRecord, now: Date = new Date()): string | undefined {
  if (!cache.lastProjectPath || !cache.lastProjectAt) return undefined;
  const age = now.getTime() - Date.parse(cache.lastProjectAt);
  return age >= 0 && age <= PROJECT_FRESHNESS_MS ? cache.lastProjectPath : undefined;
}
