/**
 * dbt_project.yml + packages.yml model.
 *
 * The project file keeps the fields dbtkit edits as typed properties and
 * every other top-level key (config-version, models, vars, ...) verbatim in
 * `extra`, so a save never drops configuration dbtkit does not understand.
 * Packages live in the sibling packages.yml and are read and written with it.
 */

import { z } from "zod";
import { ValidationError } from "./errors.js";
import { isMapping, toValidationError } from "./schema-issues.js";

export const PROJECT_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
export const VERSION_PATTERN = /^\d+(\.\d+){0,2}(-[0-9A-Za-z.-]+)?(\+[0-9A-Za-z.-]+)?$/;
export const HUB_PACKAGE_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

export const PATH_FIELDS = [
  "model-paths",
  "seed-paths",
  "macro-paths",
  "snapshot-paths",
  "test-paths",
  "analysis-paths",
] as const;

export type PathField = (typeof PATH_FIELDS)[number];

/** dbt's own defaults for a path field missing from the file. */
export const DEFAULT_PATHS: Readonly<Record<PathField, readonly string[]>> = {
  "model-paths": ["models"],
  "seed-paths": ["seeds"],
  "macro-paths": ["macros"],
  "snapshot-paths": ["snapshots"],
  "test-paths": ["tests"],
  "analysis-paths": ["analyses"],
};

/** Fresh, mutable copy of DEFAULT_PATHS. */
export function defaultPaths(): Record<PathField, string[]> {
  return {
    "model-paths": [...DEFAULT_PATHS["model-paths"]],
    "seed-paths": [...DEFAULT_PATHS["seed-paths"]],
    "macro-paths": [...DEFAULT_PATHS["macro-paths"]],
    "snapshot-paths": [...DEFAULT_PATHS["snapshot-paths"]],
    "test-paths": [...DEFAULT_PATHS["test-paths"]],
    "analysis-paths": [...DEFAULT_PATHS["analysis-paths"]],
  };
}

export type VersionConstraint = string | string[];

export interface HubPackage {
  kind: "hub";
  package: string;
  version: VersionConstraint;
}

export interface GitPackage {
  kind: "git";
  git: string;
  revision: string;
  subdirectory?: string;
}

export interface LocalPackage {
  kind: "local";
  local: string;
}

export type PackageRef = HubPackage | GitPackage | LocalPackage;
export type PackageKind = PackageRef["kind"];

export interface ProjectDocument {
  name: string;
  version: string;
  profile: string;
  requireDbtVersion?: VersionConstraint;
  paths: Record<PathField, string[]>;
  packages: PackageRef[];
  /** Top-level keys of dbt_project.yml not modelled above, in file order. */
  extra: Record<string, unknown>;
}

export const NAME_RULE = "must start with a letter or underscore and contain only letters, digits and underscores";
export const VERSION_RULE = "must be a semantic version such as 1.0.0";

const scalarString = z.union([z.string(), z.number().transform(String)]);

export const ProjectNameSchema = z.string().regex(PROJECT_NAME_PATTERN, NAME_RULE);
export const ProjectVersionSchema = scalarString.pipe(z.string().regex(VERSION_PATTERN, VERSION_RULE));
export const VersionConstraintSchema = z.union([
  scalarString.pipe(z.string().min(1, "must not be empty")),
  z.array(scalarString).min(1, "must not be empty"),
]);

const PathListSchema = z.array(z.string());

const ProjectFileSchema = z.object({
  name: ProjectNameSchema,
  version: ProjectVersionSchema,
  profile: z.string().min(1, "must not be empty"),
  "require-dbt-version": VersionConstraintSchema.optional(),
  "model-paths": PathListSchema.optional(),
  "seed-paths": PathListSchema.optional(),
  "macro-paths": PathListSchema.optional(),
  "snapshot-paths": PathListSchema.optional(),
  "test-paths": PathListSchema.optional(),
  "analysis-paths": PathListSchema.optional(),
});

const MODELLED_KEYS = new Set<string>(Object.keys(ProjectFileSchema.shape));

const HubEntrySchema = z
  .object({ package: z.string().min(1, "must not be empty"), version: VersionConstraintSchema })
  .strict();

const GitEntrySchema = z
  .object({
    git: z.string().min(1, "must not be empty"),
    revision: scalarString.pipe(z.string().min(1, "must not be empty")),
    subdirectory: z.string().optional(),
  })
  .strict();

const LocalEntrySchema = z.object({ local: z.string().min(1, "must not be empty") }).strict();

const SOURCE_KEYS = ["package", "git", "local"] as const;

export function isPathField(field: string): field is PathField {
  return PATH_FIELDS.some((known) => known === field);
}

/** Accepts `model_paths` as well as `model-paths`. */
export function normalizePathField(field: string): string {
  return field.trim().replace(/_/g, "-");
}

export function validateHubPackageName(name: string): string {
  if (!HUB_PACKAGE_PATTERN.test(name)) {
    throw new ValidationError("package", `'${name}' must be in namespace/name form, e.g. dbt-labs/dbt_utils`);
  }
  return name;
}

/** Decide the package variant from which source key the entry carries. */
export function parsePackageEntry(raw: unknown, index: number): PackageRef {
  const field = ["packages", index];
  if (!isMapping(raw)) throw new ValidationError(field.join("."), "must be a mapping");

  const sources = SOURCE_KEYS.filter((key) => Object.hasOwn(raw, key));
  if (sources.length !== 1) {
    const found = sources.length ? `found ${sources.join(", ")}` : "found none";
    throw new ValidationError(field.join("."), `must have exactly one of package, git, local (${found})`);
  }

  switch (sources[0]) {
    case "package": {
      const result = HubEntrySchema.safeParse(raw);
      if (!result.success) throw toValidationError(result.error, field);
      return { kind: "hub", package: result.data.package, version: result.data.version };
    }
    case "git": {
      const result = GitEntrySchema.safeParse(raw);
      if (!result.success) throw toValidationError(result.error, field);
      const { git, revision, subdirectory } = result.data;
      return subdirectory === undefined
        ? { kind: "git", git, revision }
        : { kind: "git", git, revision, subdirectory };
    }
    default: {
      const result = LocalEntrySchema.safeParse(raw);
      if (!result.success) throw toValidationError(result.error, field);
      return { kind: "local", local: result.data.local };
    }
  }
}

/** Validate a parsed packages.yml tree. Missing or empty file means no packages. */
export function parsePackageList(raw: unknown): PackageRef[] {
  if (raw === null || raw === undefined) return [];
  if (!isMapping(raw)) throw new ValidationError("", "packages document must be a mapping");

  const unknown = Object.keys(raw).filter((key) => key !== "packages");
  if (unknown.length) throw new ValidationError("", `unknown field(s): ${unknown.join(", ")}`);

  const entries = raw.packages ?? [];
  if (!Array.isArray(entries)) throw new ValidationError("packages", "must be a list");
  return entries.map((entry: unknown, i) => parsePackageEntry(entry, i));
}

/** Validate a parsed dbt_project.yml tree together with its package list. */
export function parseProjectDocument(raw: unknown, rawPackages?: unknown): ProjectDocument {
  if (!isMapping(raw)) throw new ValidationError("", "project document must be a mapping");

  const result = ProjectFileSchema.safeParse(raw);
  if (!result.success) throw toValidationError(result.error);
  const data = result.data;

  const paths = defaultPaths();
  for (const field of PATH_FIELDS) {
    paths[field] = data[field] ?? paths[field];
  }

  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!MODELLED_KEYS.has(key)) extra[key] = value;
  }

  const doc: ProjectDocument = {
    name: data.name,
    version: data.version,
    profile: data.profile,
    paths,
    packages: parsePackageList(rawPackages),
    extra,
  };
  if (data["require-dbt-version"] !== undefined) doc.requireDbtVersion = data["require-dbt-version"];
  return doc;
}
