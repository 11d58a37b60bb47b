import { describe, it, expect } from "vitest";
import {
  ALREADY_PRESENT,
  NOTHING_REMOVED,
  addGitPackage,
  addHubPackage,
  addLocalPackage,
  addPath,
  describePackages,
  removePackage,
  removePath,
  setName,
  setProfile,
  setRequireDbtVersion,
  setVersion,
  updatePackageVersion,
} from "../../src/lib/project-editor.js";
import { unwrap } from "../../src/lib/edit-result.js";
import { NotFoundError, ValidationError, WrongPackageKindError } from "../../src/lib/errors.js";
import { defaultPaths, type ProjectDocument } from "../../src/lib/project-schema.js";

function sample(): ProjectDocument {
  return {
    name: "shop",
    version: "1.0.0",
    profile: "analytics",
    paths: defaultPaths(),
    packages: [
      { kind: "hub", package: "dbt-labs/codegen", version: [">=0.12.0", "<1.0.0"] },
      { kind: "git", git: "https://github.com/example/pkg.git", revision: "v1.0.0" },
      { kind: "local", local: "../shared" },
    ],
    extra: { "config-version": 2 },
  };
}

describe("scalar fields", () => {
  it("renames the project", () => {
    const result = unwrap(setName(sample(), "store"));
    expect(result.document.name).toBe("store");
  });

  it("rejects a name dbt cannot use", () => {
    expect(() => unwrap(setName(sample(), "my-shop"))).toThrow(ValidationError);
  });

  it("sets profile and version", () => {
    expect(unwrap(setProfile(sample(), "warehouse")).document.profile).toBe("warehouse");
    expect(unwrap(setVersion(sample(), "2.1.0")).document.version).toBe("2.1.0");
  });

  it("rejects a malformed version", () => {
    expect(() => unwrap(setVersion(sample(), "v2"))).toThrow("version: must be a semantic version such as 1.0.0");
  });

  it("sets and removes require-dbt-version", () => {
    const set = unwrap(setRequireDbtVersion(sample(), [">=1.7.0", "<2.0.0"]));
    expect(set.document.requireDbtVersion).toEqual([">=1.7.0", "<2.0.0"]);
    expect(set.summary).toBe('Set require-dbt-version to ">=1.7.0", "<2.0.0"');
    const removed = unwrap(setRequireDbtVersion(set.document, undefined));
    expect(removed.document.requireDbtVersion).toBeUndefined();
  });
});

describe("paths", () => {
  it("appends to a path field", () => {
    const result = unwrap(addPath(sample(), "model-paths", "marts"));
    expect(result.document.paths["model-paths"]).toEqual(["models", "marts"]);
    expect(result.summary).toBe("Added 'marts' to model-paths");
  });

  it("accepts underscores in the field name", () => {
    expect(unwrap(addPath(sample(), "seed_paths", "data")).document.paths["seed-paths"]).toEqual(["seeds", "data"]);
  });

  it("does not add a value twice", () => {
    const doc = sample();
    const result = unwrap(addPath(doc, "model-paths", "models"));
    expect(result.document).toBe(doc);
    expect(result.note).toBe(ALREADY_PRESENT);
  });

  it("rejects an unknown path field", () => {
    expect(() => unwrap(addPath(sample(), "docs-paths", "docs"))).toThrow(
      "path-field: must be one of model-paths, seed-paths, macro-paths, snapshot-paths, test-paths, analysis-paths (got 'docs-paths')",
    );
  });

  it("removes a value", () => {
    const result = unwrap(removePath(sample(), "macro-paths", "macros"));
    expect(result.document.paths["macro-paths"]).toEqual([]);
    expect(result.summary).toBe("Removed 'macros' from macro-paths");
  });

  it("trims the value the way addPath does", () => {
    const added = unwrap(addPath(sample(), "model-paths", " staging ")).document;
    const result = unwrap(removePath(added, "model-paths", " staging"));
    expect(result.document.paths["model-paths"]).toEqual(["models"]);
    expect(result.summary).toBe("Removed 'staging' from model-paths");
  });

  it("succeeds with a note when the value is absent, every time", () => {
    const doc = sample();
    const first = unwrap(removePath(doc, "model-paths", "legacy"));
    const second = unwrap(removePath(first.document, "model-paths", "legacy"));
    expect(first.note).toBe(NOTHING_REMOVED);
    expect(second.note).toBe(NOTHING_REMOVED);
    expect(second.document).toEqual(doc);
  });
});

describe("packages", () => {
  it("appends hub, git and local packages", () => {
    let doc: ProjectDocument = { ...sample(), packages: [] };
    doc = unwrap(addHubPackage(doc, "dbt-labs/dbt_utils", [">=1.0.0", "<2.0.0"])).document;
    doc = unwrap(addGitPackage(doc, "https://example.com/x.git", "main", "sub")).document;
    doc = unwrap(addLocalPackage(doc, "../local")).document;
    expect(describePackages(doc)).toEqual([
      '[hub] dbt-labs/dbt_utils ">=1.0.0", "<2.0.0"',
      "[git] https://example.com/x.git@main (sub)",
      "[local] ../local",
    ]);
  });

  it("does not detect duplicate packages", () => {
    const once = unwrap(addHubPackage(sample(), "dbt-labs/codegen", "0.12.1")).document;
    expect(once.packages.filter((p) => p.kind === "hub" && p.package === "dbt-labs/codegen")).toHaveLength(2);
  });

  it("rejects a hub name without a namespace", () => {
    expect(() => unwrap(addHubPackage(sample(), "dbt_utils", "1.0.0"))).toThrow(
      "package: 'dbt_utils' must be in namespace/name form, e.g. dbt-labs/dbt_utils",
    );
  });

  it("removes a package by identity", () => {
    const result = unwrap(removePackage(sample(), "../shared"));
    expect(result.document.packages.map((p) => p.kind)).toEqual(["hub", "git"]);
    expect(result.summary).toBe("Removed package '../shared'");
  });

  it("updates a hub package version", () => {
    const result = unwrap(updatePackageVersion(sample(), "dbt-labs/codegen", "0.13.1"));
    expect(result.document.packages[0]).toEqual({ kind: "hub", package: "dbt-labs/codegen", version: "0.13.1" });
    expect(result.summary).toBe(`Updated 'dbt-labs/codegen' to "0.13.1"`);
  });
});

describe("scenario: removing a package that is not there", () => {
  it("fails with NotFoundError and leaves the document unchanged", () => {
    const doc = sample();
    const before = structuredClone(doc);
    const outcome = removePackage(doc, "dbt-labs/dbt_utils");
    expect(() => unwrap(outcome)).toThrow(NotFoundError);
    expect(() => unwrap(outcome)).toThrow("Package 'dbt-labs/dbt_utils' not found");
    expect(doc).toEqual(before);
  });
});

describe("scenario: versioning a git package", () => {
  it("fails with WrongPackageKindError", () => {
    const outcome = updatePackageVersion(sample(), "https://github.com/example/pkg.git", "1.1.0");
    expect(() => unwrap(outcome)).toThrow(WrongPackageKindError);
    expect(() => unwrap(outcome)).toThrow(
      "Package 'https://github.com/example/pkg.git' is a git package, only hub packages have a version",
    );
  });
});
