import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ProfileWizard, editableFields, fieldChange, parseSetting } from "../../src/tui/profile-wizard.js";
import { ProjectWizard, askProjectInit, pickDiscoveredProject } from "../../src/tui/project-wizard.js";
import { silentLogger } from "../../src/lib/logger.js";
import type { ProfileDocument } from "../../src/lib/profile-schema.js";
import { defaultPaths, type ProjectDocument } from "../../src/lib/project-schema.js";
import { ScriptedPrompter } from "../helpers/scripted-prompter.js";
import { printed } from "../helpers/test-context.js";

describe("profile wizard", () => {
  let consoleSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  it("adds a profile and a DuckDB output, and cancels a risky delete", async () => {
    const saved: ProfileDocument[] = [];
    const prompter = new ScriptedPrompter([
      "add-profile", "analytics",
      "add-output", "analytics", "", "duckdb", "", "", "", "httpfs, json", true, "bad", "threads=2", "",
      "delete-output", "analytics", "dev", false,
      "exit",
    ]);
    const wizard = new ProfileWizard({}, { prompter, logger: silentLogger(), save: async (doc) => { saved.push(doc); } });

    const result = await wizard.run();

    expect(prompter.remaining).toBe(0);
    expect(saved).toHaveLength(2);
    expect(result).toEqual({
      analytics: {
        target: "dev",
        outputs: {
          dev: { type: "duckdb", path: ":memory:", threads: 4, extensions: ["httpfs", "json"], settings: { threads: "2" } },
        },
      },
    });
    expect(printed(consoleSpy)).toEqual([
      "✓ Added profile 'analytics'",
      "Enter settings as key=value (empty to finish):",
      "  ✗ use key=value",
      "✓ Added duckdb output 'dev' to profile 'analytics' (now the target)",
      "Cancelled.",
    ]);
  });

  it("moves the target when deleting it with others left", async () => {
    const doc: ProfileDocument = {
      analytics: {
        target: "dev",
        outputs: {
          dev: { type: "duckdb", path: "dev.duckdb", threads: 4 },
          ci: { type: "duckdb", path: ":memory:", threads: 1 },
        },
      },
    };
    const prompter = new ScriptedPrompter(["delete-output", "analytics", "dev", "ci", true, "exit"]);
    const result = await new ProfileWizard(doc, { prompter, logger: silentLogger(), save: async () => {} }).run();
    expect(result.analytics).toEqual({ target: "ci", outputs: { ci: { type: "duckdb", path: ":memory:", threads: 1 } } });
    expect(printed(consoleSpy)).toEqual(["✓ Deleted output 'dev' from profile 'analytics'; target is now 'ci'"]);
  });

  it("edits a Databricks token through a password prompt", async () => {
    const doc: ProfileDocument = {
      warehouse: {
        target: "prod",
        outputs: {
          prod: { type: "databricks", host: "h", http_path: "/sql", catalog: "main", schema: "s", auth_type: "token", token: "test-token" },
        },
      },
    };
    const prompter = new ScriptedPrompter(["edit-output", "warehouse", "prod", "token", "test-token-2", "exit"]);
    const result = await new ProfileWizard(doc, { prompter, logger: silentLogger(), save: async () => {} }).run();
    expect(result.warehouse.outputs.prod).toMatchObject({ token: "test-token-2" });
    expect(prompter.asked).toContain("token");
  });

  it("reports a failed edit and keeps going", async () => {
    const prompter = new ScriptedPrompter(["add-profile", "analytics", "add-profile", "analytics", "exit"]);
    await new ProfileWizard({}, { prompter, logger: silentLogger(), save: async () => {} }).run();
    expect(printed(consoleSpy)).toEqual(["✓ Added profile 'analytics'", "✗ Profile 'analytics' already exists"]);
  });

  it("asks for a profile before outputs exist", async () => {
    const prompter = new ScriptedPrompter(["add-output", "exit"]);
    await new ProfileWizard({}, { prompter, logger: silentLogger(), save: async () => {} }).run();
    expect(printed(consoleSpy)).toEqual(["No profiles yet. Add one first."]);
  });
});

describe("profile wizard helpers", () => {
  it("parses key=value settings", () => {
    expect(parseSetting(" memory_limit = 2GB ")).toEqual(["memory_limit", "2GB"]);
    expect(parseSetting("=x")).toBeUndefined();
    expect(parseSetting("nokey")).toBeUndefined();
  });

  it("turns typed text into field changes", () => {
    expect(fieldChange("threads", "8")).toEqual({ threads: 8 });
    expect(fieldChange("extensions", "httpfs, json")).toEqual({ extensions: ["httpfs", "json"] });
    expect(fieldChange("settings", "a=1, b=2")).toEqual({ settings: { a: "1", b: "2" } });
    expect(fieldChange("schema", "")).toEqual({ schema: null });
  });

  it("offers credential fields by auth type", () => {
    const base = { type: "databricks", host: "h", http_path: "/p", catalog: "c", schema: "s" } as const;
    expect(editableFields({ ...base, auth_type: "oauth-u2m" })).toEqual(["host", "http_path", "catalog", "schema", "threads"]);
    expect(editableFields({ ...base, auth_type: "oauth-m2m", client_id: "svc", client_secret: "test-secret" })).toEqual([
      "host", "http_path", "catalog", "schema", "client_id", "client_secret", "threads",
    ]);
  });
});

describe("project wizard", () => {
  let consoleSpy: ReturnType<typeof vi.spyOn>;

  const sample = (): ProjectDocument => ({
    name: "shop",
    version: "1.0.0",
    profile: "analytics",
    paths: defaultPaths(),
    packages: [{ kind: "git", git: "https://example.com/pkg.git", revision: "main" }],
    extra: {},
  });

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  it("saves only edits that change the document", async () => {
    const saved: ProjectDocument[] = [];
    const prompter = new ScriptedPrompter([
      "add-path", "model-paths", "models",
      "add-hub-package", "codegen", ">=0.13.0, <1.0.0",
      "exit",
    ]);
    const result = await new ProjectWizard(sample(), {
      prompter,
      logger: silentLogger(),
      save: async (doc) => { saved.push(doc); },
    }).run();

    expect(saved).toHaveLength(1);
    expect(result.packages[1]).toEqual({ kind: "hub", package: "dbt-labs/codegen", version: [">=0.13.0", "<1.0.0"] });
    expect(printed(consoleSpy).filter((l) => !l.startsWith("\nProject"))).toEqual([
      "✓ 'models' is already in model-paths (already present, nothing added)",
      '✓ Added package dbt-labs/codegen ">=0.13.0", "<1.0.0"',
    ]);
  });

  it("only offers hub packages for a version update", async () => {
    const prompter = new ScriptedPrompter(["update-package-version", "exit"]);
    await new ProjectWizard(sample(), { prompter, logger: silentLogger(), save: async () => {} }).run();
    expect(printed(consoleSpy)).toContain("No dbt Hub packages.");
  });

  it("shows the error for a bad version", async () => {
    const prompter = new ScriptedPrompter(["set-version", "one", "exit"]);
    await new ProjectWizard(sample(), { prompter, logger: silentLogger(), save: async () => {} }).run();
    expect(printed(consoleSpy)).toContain("✗ version: must be a semantic version such as 1.0.0");
  });

  it("picks among several discovered projects", async () => {
    const prompter = new ScriptedPrompter(["/repo/b/shop"]);
    const chosen = await pickDiscoveredProject(prompter, "/repo", ["/repo/a/crm/dbt_project.yml", "/repo/b/shop/dbt_project.yml"]);
    expect(chosen).toBe("/repo/b/shop");
    expect(printed(consoleSpy)).toEqual(["Found 2 dbt projects"]);
    expect(await pickDiscoveredProject(prompter, "/repo", [])).toBeUndefined();
  });

  it("collects init answers with defaults", async () => {
    const prompter = new ScriptedPrompter(["shop", "", "", "", true, false, false, false, "", "", "", ""]);
    const answers = await askProjectInit(prompter, { baseDir: "/work", profiles: [] });
    expect(answers).toEqual({
      name: "shop",
      profile: "shop",
      baseDir: "/work",
      team: undefined,
      packages: ["dbt-labs/dbt_utils", "dbt-labs/codegen"],
      materialization: "view",
      persistDocs: false,
      withExample: true,
      runDeps: true,
    });
  });
});
