/**
 * dbt Hub lookups for `project init`: short package names, and the
 * version range to pin a new package to.
 */

import { z } from "zod";
import { validateHubPackageName } from "./project-schema.js";
import type { Logger } from "./logger.js";

export const HUB_API = "https://hub.getdbt.com/api/v1";
export const HUB_TIMEOUT_MS = 5000;

export const DEFAULT_PACKAGE = "dbt-labs/dbt_utils";

/** Used when the Hub cannot be reached. */
export const FALLBACK_RANGE = [">=1.0.0", "<2.0.0"];

/** Short names accepted by `--packages`. */
export const KNOWN_PACKAGES: Readonly<Record<string, string>> = {
  dbt_utils: "dbt-labs/dbt_utils",
  "dbt-utils": "dbt-labs/dbt_utils",
  elementary: "elementary-data/elementary",
  codegen: "dbt-labs/codegen",
  dbt_expectations: "calogica/dbt_expectations",
  "dbt-expectations": "calogica/dbt_expectations",
  audit_helper: "dbt-labs/audit_helper",
  "audit-helper": "dbt-labs/audit_helper",
};

/** Offered by the interactive init wizard. */
export const POPULAR_PACKAGES: ReadonlyArray<{ name: string; description: string }> = [
  { name: "dbt-labs/dbt_utils", description: "generic tests and SQL helpers" },
  { name: "dbt-labs/codegen", description: "generate sources and model YAML" },
  { name: "calogica/dbt_expectations", description: "Great Expectations style tests" },
  { name: "dbt-labs/audit_helper", description: "compare relations during refactors" },
  { name: "elementary-data/elementary", description: "data observability" },
];

const HubPackageInfo = z.object({ latest: z.string() });

export type Fetcher = (url: string, init?: { signal?: AbortSignal }) => Promise<{ ok: boolean; status: number; json(): Promise<unknown> }>;

export function resolvePackageName(name: string): string {
  const trimmed = name.trim();
  return validateHubPackageName(KNOWN_PACKAGES[trimmed] ?? trimmed);
}

/** `1.3.0` becomes `[">=1.3.0", "<2.0.0"]`. */
export function rangeFor(latest: string): string[] {
  const match = /^v?(\d+)\.(\d+)\.(\d+)/.exec(latest);
  if (!match) throw new Error(`unexpected version '${latest}'`);
  const [, major, minor, patch] = match;
  return [`>=${major}.${minor}.${patch}`, `<${Number(major) + 1}.0.0`];
}

export async function fetchLatestVersion(name: string, fetcher: Fetcher = fetch): Promise<string> {
  const res = await fetcher(`${HUB_API}/${name}.json`, { signal: AbortSignal.timeout(HUB_TIMEOUT_MS) });
  if (!res.ok) throw new Error(`dbt Hub returned HTTP ${res.status} for ${name}`);
  return HubPackageInfo.parse(await res.json()).latest;
}

/**
 * Version ranges for several packages, looked up in parallel. A failed
 * lookup falls back to FALLBACK_RANGE and logs a warning.
 */
export async function packageVersions(
  names: readonly string[],
  logger: Logger,
  fetcher: Fetcher = fetch,
): Promise<Map<string, string[]>> {
  const entries = await Promise.all(
    names.map(async (name): Promise<[string, string[]]> => {
      try {
        return [name, rangeFor(await fetchLatestVersion(name, fetcher))];
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        logger.warn(`could not look up ${name} on dbt Hub, using ${FALLBACK_RANGE.join(", ")}`, { reason });
        return [name, [...FALLBACK_RANGE]];
      }
    }),
  );
  return new Map(entries);
}
