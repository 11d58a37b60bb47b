import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as path from "path";
import * as os from "os";
import {
  FALLBACK_RANGE,
  HUB_API,
  packageVersions,
  rangeFor,
  resolvePackageName,
  type Fetcher,
} from "../../src/lib/hub.js";
import {
  REGISTRY_URL,
  checkForUpdate,
  compareSemver,
  refreshVersionCache,
} from "../../src/lib/version-check.js";
import { readCache, updateCache } from "../../src/lib/cache.js";
import { Logger, silentLogger } from "../../src/lib/logger.js";

function jsonFetcher(bodies: Record<string, unknown>, seen: string[] = []): Fetcher {
  return async (url) => {
    seen.push(url);
    if (!(url in bodies)) return { ok: false, status: 404, json: async () => ({}) };
    return { ok: true, status: 200, json: async () => bodies[url] };
  };
}

const offline: Fetcher = async () => {
  throw new Error("network unreachable");
};

describe("dbt Hub lookups", () => {
  it("expands short package names", () => {
    expect(resolvePackageName("dbt_utils")).toBe("dbt-labs/dbt_utils");
    expect(resolvePackageName(" dbt-expectations ")).toBe("calogica/dbt_expectations");
    expect(resolvePackageName("acme/custom")).toBe("acme/custom");
  });

  it("rejects an unknown bare name", () => {
    expect(() => resolvePackageName("mystery")).toThrow("namespace/name");
  });

  it("pins to the current major", () => {
    expect(rangeFor("1.3.0")).toEqual([">=1.3.0", "<2.0.0"]);
    expect(rangeFor("v0.12.1")).toEqual([">=0.12.1", "<1.0.0"]);
    expect(() => rangeFor("latest")).toThrow("unexpected version 'latest'");
  });

  it("looks up each package and falls back when one fails", async () => {
    const lines: string[] = [];
    const logger = new Logger({ level: "warn", stream: { write: (s: string) => lines.push(s) } });
    const seen: string[] = [];
    const fetcher = jsonFetcher({ [`${HUB_API}/dbt-labs/dbt_utils.json`]: { latest: "1.3.0" } }, seen);

    const versions = await packageVersions(["dbt-labs/dbt_utils", "acme/private"], logger, fetcher);

    expect(versions.get("dbt-labs/dbt_utils")).toEqual([">=1.3.0", "<2.0.0"]);
    expect(versions.get("acme/private")).toEqual(FALLBACK_RANGE);
    expect(seen).toEqual([`${HUB_API}/dbt-labs/dbt_utils.json`, `${HUB_API}/acme/private.json`]);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain("could not look up acme/private on dbt Hub, using >=1.0.0, <2.0.0");
  });
});

describe("compareSemver", () => {
  it("orders versions numerically", () => {
    expect(compareSemver("0.10.0", "0.9.9")).toBe(1);
    expect(compareSemver("v1.2.3", "1.2.3")).toBe(0);
    expect(compareSemver("1.2.3", "1.3.0")).toBe(-1);
  });
});

describe("version check", () => {
  let tmpDir: string;
  let cacheFile: string;
  const now = new Date("2026-05-01T08:00:00.000Z");

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "dbtkit-version-"));
    cacheFile = path.join(tmpDir, "state.json");
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("stores the latest release after a lookup", async () => {
    await refreshVersionCache({
      currentVersion: "0.4.0",
      cacheFile,
      logger: silentLogger(),
      fetcher: jsonFetcher({ [REGISTRY_URL]: { version: "0.5.0" } }),
      now,
    });
    expect(await readCache(cacheFile)).toEqual({ latestVersion: "0.5.0", lastVersionCheck: now.toISOString() });
  });

  it("writes nothing when the registry is unreachable", async () => {
    const check = await checkForUpdate({ currentVersion: "0.4.0", cacheFile, logger: silentLogger(), fetcher: offline, now });
    expect(check.newerVersion).toBeUndefined();
    await check.refresh;
    await expect(fs.access(cacheFile)).rejects.toThrow();
  });

  it("answers from a fresh cache without a lookup", async () => {
    await updateCache(cacheFile, { latestVersion: "0.5.0", lastVersionCheck: "2026-05-01T07:00:00.000Z" });
    const seen: string[] = [];
    const check = await checkForUpdate({
      currentVersion: "0.4.0",
      cacheFile,
      logger: silentLogger(),
      fetcher: jsonFetcher({}, seen),
      now,
    });
    expect(check).toEqual({ newerVersion: "0.5.0", refresh: undefined });
    expect(seen).toEqual([]);
  });

  it("reports nothing when already up to date", async () => {
    await updateCache(cacheFile, { latestVersion: "0.4.0", lastVersionCheck: now.toISOString() });
    const check = await checkForUpdate({ currentVersion: "0.4.0", cacheFile, logger: silentLogger(), now });
    expect(check.newerVersion).toBeUndefined();
  });
});
