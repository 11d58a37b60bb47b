import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as path from "path";
import * as os from "os";
import { formatProject, projectCommand } from "../../src/commands/project.js";
import { readCache } from "../../src/lib/cache.js";
import type { CommandContext } from "../../src/lib/context.js";
import { loadProject } from "../../src/lib/documents.js";
import { NotFoundError, ValidationError } from "../../src/lib/errors.js";
import { HUB_API } from "../../src/lib/hub.js";
import { setJsonMode } from "../../src/lib/output.js";
import { defaultPaths } from "../../src/lib/project-schema.js";
import { initProject } from "../../src/lib/scaffold.js";
import { hubFetcher, printed, testContext, type SpawnCall } from "../helpers/test-context.js";
import { ScriptedPrompter } from "../helpers/scripted-prompter.js";

const HUB_LATEST = { "dbt-labs/dbt_utils": "1.3.0", "dbt-labs/codegen": "0.13.1" };

describe("dbt project command", () => {
  let tmpDir: string;
  let consoleSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    tmpDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), "dbtkit-project-cmd-")));
    consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    consoleSpy.mockRestore();
    setJsonMode(false);
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe("init", () => {
    it("creates a project with Hub-pinned packages and runs deps", async () => {
      const calls: SpawnCall[] = [];
      const seen: string[] = [];
      const ctx = testContext(tmpDir, { calls, fetcher: hubFetcher(HUB_LATEST, seen) });
      await projectCommand("init", ["-n", "shop", "-p", "analytics", "-b", tmpDir, "--packages", "codegen", "--run-deps"], ctx);

      const dir = path.join(tmpDir, "shop");
      expect(printed(consoleSpy)[0]).toBe(`✓ Created project shop at ${dir}`);
      expect(printed(consoleSpy)).toContain("  packages.yml");
      expect(seen).toEqual([`${HUB_API}/dbt-labs/dbt_utils.json`, `${HUB_API}/dbt-labs/codegen.json`]);

      const loaded = await loadProject(dir);
      expect(loaded.document.packages).toEqual([
        { kind: "hub", package: "dbt-labs/dbt_utils", version: [">=1.3.0", "<2.0.0"] },
        { kind: "hub", package: "dbt-labs/codegen", version: [">=0.13.1", "<1.0.0"] },
      ]);
      expect(loaded.document.extra.models).toEqual({ shop: { "+materialized": "view" } });

      expect(calls).toHaveLength(1);
      expect(calls[0].args).toEqual(["deps"]);
      expect(calls[0].options.cwd).toBe(dir);
      expect(calls[0].options.env?.DBT_PROFILES_DIR).toBe(tmpDir);
      expect((await readCache(ctx.cacheFile)).lastProjectPath).toBe(dir);
    });

    it("reminds about dbt deps when it was not run", async () => {
      const ctx = testContext(tmpDir, { fetcher: hubFetcher(HUB_LATEST) });
      await projectCommand("init", ["-n", "shop", "-p", "analytics", "-b", tmpDir, "-t", "sales"], ctx);
      const lines = printed(consoleSpy);
      expect(lines[lines.length - 1]).toBe(`\nRun 'dbt deps' in ${path.join(tmpDir, "sales", "shop")}`);
    });

    it("reports a failed dbt deps without failing the init", async () => {
      const ctx = testContext(tmpDir, { exitCode: 2, fetcher: hubFetcher(HUB_LATEST) });
      await projectCommand("init", ["-n", "shop", "-p", "analytics", "-b", tmpDir, "--run-deps"], ctx);
      const lines = printed(consoleSpy);
      expect(lines[lines.length - 1]).toBe(
        `\n✗ dbt deps exited with code 2; run it again in ${path.join(tmpDir, "shop")}`,
      );
    });

    it("skips packages.yml and deps with --no-packages", async () => {
      const calls: SpawnCall[] = [];
      const ctx = testContext(tmpDir, { calls });
      await projectCommand("init", ["-n", "shop", "-p", "analytics", "-b", tmpDir, "--no-packages", "--run-deps"], ctx);
      expect(calls).toEqual([]);
      expect((await loadProject(path.join(tmpDir, "shop"))).hasPackagesFile).toBe(false);
    });

    it("refuses an existing directory before asking dbt Hub", async () => {
      await fs.mkdir(path.join(tmpDir, "shop"));
      const seen: string[] = [];
      const ctx = testContext(tmpDir, { fetcher: hubFetcher(HUB_LATEST, seen) });
      await expect(projectCommand("init", ["-n", "shop", "-p", "analytics", "-b", tmpDir], ctx)).rejects.toThrow(
        `Project directory already exists: ${path.join(tmpDir, "shop")} (use --force to overwrite)`,
      );
      expect(seen).toEqual([]);
    });

    it("validates its flags", async () => {
      const ctx = testContext(tmpDir);
      await expect(projectCommand("init", ["-b", tmpDir], ctx)).rejects.toThrow(
        "-n/--project-name is required when not running in a terminal",
      );
      await expect(projectCommand("init", ["-n", "shop", "-b", tmpDir], ctx)).rejects.toThrow(
        "--profile is required when --project-name is given",
      );
      await expect(
        projectCommand("init", ["-n", "shop", "-p", "a", "-b", tmpDir, "--materialization", "incremental"], ctx),
      ).rejects.toThrow(ValidationError);
    });

    it("runs the wizard in a terminal", async () => {
      const prompter = new ScriptedPrompter([
        "shop", // name
        "", // profile: first from profiles.yml
        tmpDir, // base directory
        "", // team
        false, false, false, false, // popular packages
        "table",
        false, // persist docs
        false, // example
        false, // deps
      ]);
      await fs.writeFile(path.join(tmpDir, "profiles.yml"), "warehouse:\n  outputs: {}\n");
      const ctx: CommandContext = { ...testContext(tmpDir, { fetcher: hubFetcher(HUB_LATEST) }), openPrompter: () => prompter };

      await projectCommand("init", [], ctx);

      expect(prompter.remaining).toBe(0);
      expect(prompter.closed).toBe(true);
      const loaded = await loadProject(path.join(tmpDir, "shop"));
      expect(loaded.document.profile).toBe("warehouse");
      expect(loaded.document.extra.models).toEqual({ shop: { "+materialized": "table" } });
    });
  });

  describe("show and edit", () => {
    let dir: string;
    let ctx: CommandContext;

    beforeEach(async () => {
      dir = (
        await initProject({
          name: "shop",
          profile: "analytics",
          baseDir: tmpDir,
          packages: [{ kind: "hub", package: "dbt-labs/codegen", version: [">=0.13.1", "<1.0.0"] }],
        })
      ).directory;
      ctx = { ...testContext(tmpDir, { fetcher: hubFetcher(HUB_LATEST) }), cwd: path.join(dir, "models") };
    });

    const edit = (...args: string[]) => projectCommand("edit", args, ctx);

    it("shows the project found above cwd", async () => {
      await projectCommand("show", [], ctx);
      expect(printed(consoleSpy)).toEqual([
        [
          "Project: shop 1.0.0",
          `Directory: ${dir}`,
          "Profile: analytics",
          "Paths:",
          "  model-paths: models",
          "  seed-paths: seeds",
          "  macro-paths: macros",
          "  snapshot-paths: snapshots",
          "  test-paths: tests",
          "  analysis-paths: analyses",
          "Packages:",
          '  [hub] dbt-labs/codegen ">=0.13.1", "<1.0.0"',
        ].join("\n"),
      ]);
    });

    it("adds a path and creates its directory", async () => {
      await edit("--action", "add-path", "--path-field", "model_paths", "--path", "marts", "--create-dir");
      expect(printed(consoleSpy)).toEqual(["✓ Added 'marts' to model-paths"]);
      expect((await fs.stat(path.join(dir, "marts"))).isDirectory()).toBe(true);
      expect((await loadProject(dir)).document.paths["model-paths"]).toEqual(["models", "marts"]);
    });

    it("succeeds without writing when there is nothing to remove", async () => {
      const before = await fs.readFile(path.join(dir, "dbt_project.yml"), "utf-8");
      setJsonMode(true);
      await edit("--action", "remove-path", "--path-field", "seed-paths", "--path", "legacy");
      expect(JSON.parse(printed(consoleSpy)[0])).toEqual({
        action: "remove-path",
        dir,
        summary: "'legacy' is not in seed-paths",
        changed: false,
        note: "not found, nothing removed",
      });
      expect(await fs.readFile(path.join(dir, "dbt_project.yml"), "utf-8")).toBe(before);
    });

    it("adds a Hub package with the looked-up range, or the fallback", async () => {
      await edit("--action", "add-hub-package", "--package", "dbt_utils");
      await edit("--action", "add-hub-package", "--package", "acme/private");
      await edit("--action", "add-hub-package", "--package", "calogica/dbt_expectations", "--package-version", "0.10.4");
      expect(printed(consoleSpy)).toEqual([
        '✓ Added package dbt-labs/dbt_utils ">=1.3.0", "<2.0.0"',
        '✓ Added package acme/private ">=1.0.0", "<2.0.0"',
        '✓ Added package calogica/dbt_expectations "0.10.4"',
      ]);
    });

    it("updates and removes packages by short name", async () => {
      await edit("--action", "update-package-version", "--package", "codegen", "--package-version", ">=0.14.0,<1.0.0");
      expect((await loadProject(dir)).document.packages).toEqual([
        { kind: "hub", package: "dbt-labs/codegen", version: [">=0.14.0", "<1.0.0"] },
      ]);
      await edit("--action", "remove-package", "--package", "codegen");
      expect(await fs.readFile(path.join(dir, "packages.yml"), "utf-8")).toBe("packages: []\n");
    });

    it("adds git and local packages", async () => {
      await edit("--action", "add-git-package", "--git", "https://example.com/pkg.git", "--revision", "v1.0.0");
      await edit("--action", "add-local-package", "--local", "../shared");
      await edit("--action", "remove-package", "--package", "../shared");
      expect(printed(consoleSpy)).toEqual([
        "✓ Added git package https://example.com/pkg.git@v1.0.0",
        "✓ Added local package ../shared",
        "✓ Removed package '../shared'",
      ]);
    });

    it("sets and clears require-dbt-version", async () => {
      await edit("--action", "set-require-dbt-version", "--require-dbt-version", ">=1.7.0,<2.0.0");
      expect((await loadProject(dir)).document.requireDbtVersion).toEqual([">=1.7.0", "<2.0.0"]);
      await edit("--action", "set-require-dbt-version", "--require-dbt-version", "");
      expect((await loadProject(dir)).document.requireDbtVersion).toBeUndefined();
    });

    it("remembers the project for the next command", async () => {
      await edit("--action", "set-version", "--version", "1.1.0");
      const elsewhere: CommandContext = { ...ctx, cwd: tmpDir };
      await projectCommand("edit", ["--action", "set-profile", "--profile", "warehouse"], elsewhere);
      const doc = (await loadProject(dir)).document;
      expect([doc.version, doc.profile]).toEqual(["1.1.0", "warehouse"]);
    });

    it("fails for a package that is not there", async () => {
      await expect(edit("--action", "remove-package", "--package", "dbt-labs/dbt_utils")).rejects.toThrow(NotFoundError);
    });

    it("fails when no project can be found", async () => {
      const lost: CommandContext = { ...testContext(tmpDir), cwd: tmpDir };
      await expect(projectCommand("show", [], lost)).rejects.toThrow(NotFoundError);
    });

    it("finds a project below the search root for the interactive editor", async () => {
      const prompter = new ScriptedPrompter(["set-version", "2.0.0", "exit"]);
      const lost: CommandContext = { ...testContext(tmpDir), cwd: tmpDir, openPrompter: () => prompter };
      await projectCommand("edit", [], lost);

      expect(printed(consoleSpy)).toEqual([
        `Found project: ${dir}`,
        `Editing ${dir}`,
        "\nProject shop 1.0.0 (profile: analytics)",
        "✓ Set version to '2.0.0'",
        "\nProject shop 2.0.0 (profile: analytics)",
      ]);
      expect((await loadProject(dir)).document.version).toBe("2.0.0");
      expect(prompter.closed).toBe(true);
    });
  });
});

describe("formatProject", () => {
  it("lists empty sections and the dbt requirement", () => {
    const text = formatProject("/work/shop", {
      name: "shop",
      version: "1.0.0",
      profile: "analytics",
      requireDbtVersion: ">=1.7.0",
      paths: { ...defaultPaths(), "analysis-paths": [] },
      packages: [],
      extra: {},
    });
    expect(text.split("\n")).toEqual([
      "Project: shop 1.0.0",
      "Directory: /work/shop",
      "Profile: analytics",
      'Requires dbt: ">=1.7.0"',
      "Paths:",
      "  model-paths: models",
      "  seed-paths: seeds",
      "  macro-paths: macros",
      "  snapshot-paths: snapshots",
      "  test-paths: tests",
      "  analysis-paths: (none)",
      "Packages:",
      "  (none)",
    ]);
  });
});
