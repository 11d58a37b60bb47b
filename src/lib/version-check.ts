/**
 * Background check for a newer dbtkit release.
 *
 * `checkForUpdate` answers from the cache straight away and, when the cache
 * is older than CHECK_INTERVAL_MS, starts a registry lookup that it does not
 * wait for. The lookup writes the cache on success and is silent on any
 * failure; it can never change the command's exit code.
 */

import { z } from "zod";
import { readCache, updateCache } from "./cache.js";
import type { Fetcher } from "./hub.js";
import type { Logger } from "./logger.js";

export const PACKAGE_NAME = "dbtkit";
export const REGISTRY_URL = `https://registry.npmjs.org/${PACKAGE_NAME}/latest`;
export const CHECK_INTERVAL_MS = 24 * 60 * 60 * 1000;
export const CHECK_TIMEOUT_MS = 3000;

const RegistryLatest = z.object({ version: z.string() });

/**
 * Compare two semver strings. Returns:
 *  -1 if a < b, 0 if equal, 1 if a > b.
 */
export function compareSemver(a: string, b: string): number {
  const pa = a.replace(/^v/, "").split(/[.+-]/).slice(0, 3).map(Number);
  const pb = b.replace(/^v/, "").split(/[.+-]/).slice(0, 3).map(Number);
  for (let i = 0; i < 3; i++) {
    const diff = (pa[i] || 0) - (pb[i] || 0);
    if (diff !== 0) return diff > 0 ? 1 : -1;
  }
  return 0;
}

export interface VersionCheckOptions {
  currentVersion: string;
  cacheFile: string;
  logger: Logger;
  fetcher?: Fetcher;
  now?: Date;
}

export async function fetchLatestRelease(fetcher: Fetcher = fetch): Promise<string> {
  const res = await fetcher(REGISTRY_URL, { signal: AbortSignal.timeout(CHECK_TIMEOUT_MS) });
  if (!res.ok) throw new Error(`registry returned HTTP ${res.status}`);
  return RegistryLatest.parse(await res.json()).version;
}

/** Look up the latest release and store it. Never rejects. */
export async function refreshVersionCache(options: VersionCheckOptions): Promise<void> {
  try {
    const latest = await fetchLatestRelease(options.fetcher);
    await updateCache(options.cacheFile, {
      latestVersion: latest,
      lastVersionCheck: (options.now ?? new Date()).toISOString(),
    });
  } catch (err) {
    options.logger.debug("version check failed", { reason: err instanceof Error ? err.message : String(err) });
  }
}

export interface VersionCheck {
  /** A newer cached release, if any. */
  newerVersion?: string;
  /** The detached refresh, for callers (tests) that want to wait on it. */
  refresh?: Promise<void>;
}

export async function checkForUpdate(options: VersionCheckOptions): Promise<VersionCheck> {
  const now = options.now ?? new Date();
  const cache = await readCache(options.cacheFile);

  const last = cache.lastVersionCheck ? Date.parse(cache.lastVersionCheck) : NaN;
  const stale = Number.isNaN(last) || now.getTime() - last > CHECK_INTERVAL_MS;
  const refresh = stale ? refreshVersionCache(options) : undefined;

  const newer = cache.latestVersion && compareSemver(cache.latestVersion, options.currentVersion) > 0
    ? cache.latestVersion
    : undefined;
  return { newerVersion: newer, refresh };
}
