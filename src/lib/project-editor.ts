/**
 * Pure mutations over a ProjectDocument (dbt_project.yml + packages.yml).
 */

import { NotFoundError, ValidationError, WrongPackageKindError } from "./errors.js";
import { applied, attempt, type EditOutcome } from "./edit-result.js";
import {
  PATH_FIELDS,
  ProjectNameSchema,
  ProjectVersionSchema,
  VersionConstraintSchema,
  isPathField,
  normalizePathField,
  validateHubPackageName,
  type GitPackage,
  type PackageRef,
  type PathField,
  type ProjectDocument,
  type VersionConstraint,
} from "./project-schema.js";
import { toValidationError } from "./schema-issues.js";

export type ProjectOutcome = EditOutcome<ProjectDocument>;

export const NOTHING_REMOVED = "not found, nothing removed";
export const ALREADY_PRESENT = "already present, nothing added";

function validName(name: string): string {
  const result = ProjectNameSchema.safeParse(name);
  if (!result.success) throw toValidationError(result.error, ["name"]);
  return result.data;
}

function validVersion(version: string): string {
  const result = ProjectVersionSchema.safeParse(version);
  if (!result.success) throw toValidationError(result.error, ["version"]);
  return result.data;
}

function validConstraint(field: string, value: VersionConstraint): VersionConstraint {
  const result = VersionConstraintSchema.safeParse(value);
  if (!result.success) throw toValidationError(result.error, [field]);
  return result.data;
}

function requireText(field: string, value: string): string {
  const trimmed = value.trim();
  if (!trimmed) throw new ValidationError(field, "must not be empty");
  return trimmed;
}

function pathField(field: string): PathField {
  const normalized = normalizePathField(field);
  if (!isPathField(normalized)) {
    throw new ValidationError("path-field", `must be one of ${PATH_FIELDS.join(", ")} (got '${field}')`);
  }
  return normalized;
}

function withPackages(doc: ProjectDocument, packages: PackageRef[]): ProjectDocument {
  return { ...doc, packages };
}

// ── scalar fields ────────────────────────────────────────────────────

export function setName(doc: ProjectDocument, name: string): ProjectOutcome {
  return attempt(() => {
    const value = validName(name);
    return applied({ ...doc, name: value }, `Set name to '${value}'`);
  });
}

/** No check that the profile exists in profiles.yml; the two files are independent. */
export function setProfile(doc: ProjectDocument, profile: string): ProjectOutcome {
  return attempt(() => {
    const value = requireText("profile", profile);
    return applied({ ...doc, profile: value }, `Set profile to '${value}'`);
  });
}

export function setVersion(doc: ProjectDocument, version: string): ProjectOutcome {
  return attempt(() => {
    const value = validVersion(version);
    return applied({ ...doc, version: value }, `Set version to '${value}'`);
  });
}

/** `undefined` removes the constraint. */
export function setRequireDbtVersion(doc: ProjectDocument, constraint: VersionConstraint | undefined): ProjectOutcome {
  return attempt(() => {
    if (constraint === undefined) {
      const { requireDbtVersion: _removed, ...rest } = doc;
      return applied(rest, "Removed require-dbt-version");
    }
    const value = validConstraint("require-dbt-version", constraint);
    return applied({ ...doc, requireDbtVersion: value }, `Set require-dbt-version to ${formatConstraint(value)}`);
  });
}

// ── paths ────────────────────────────────────────────────────────────

export function addPath(doc: ProjectDocument, field: string, value: string): ProjectOutcome {
  return attempt(() => {
    const key = pathField(field);
    const entry = requireText("path", value);
    const current = doc.paths[key];
    if (current.includes(entry)) {
      return applied(doc, `'${entry}' is already in ${key}`, ALREADY_PRESENT);
    }
    return applied({ ...doc, paths: { ...doc.paths, [key]: [...current, entry] } }, `Added '${entry}' to ${key}`);
  });
}

/** Removing an absent value succeeds with a note, so scripts can repeat it. */
export function removePath(doc: ProjectDocument, field: string, value: string): ProjectOutcome {
  return attempt(() => {
    const key = pathField(field);
    const entry = requireText("path", value);
    const current = doc.paths[key];
    if (!current.includes(entry)) {
      return applied(doc, `'${entry}' is not in ${key}`, NOTHING_REMOVED);
    }
    return applied(
      { ...doc, paths: { ...doc.paths, [key]: current.filter((p) => p !== entry) } },
      `Removed '${entry}' from ${key}`,
    );
  });
}

// ── packages ─────────────────────────────────────────────────────────

/** The value update/remove match on: hub name, git URL or local path. */
export function packageIdentity(pkg: PackageRef): string {
  switch (pkg.kind) {
    case "hub":
      return pkg.package;
    case "git":
      return pkg.git;
    case "local":
      return pkg.local;
  }
}

export function formatConstraint(value: VersionConstraint): string {
  return Array.isArray(value) ? value.map((v) => `"${v}"`).join(", ") : `"${value}"`;
}

export function describePackage(pkg: PackageRef): string {
  switch (pkg.kind) {
    case "hub":
      return `${pkg.package} ${formatConstraint(pkg.version)}`;
    case "git":
      return `${pkg.git}@${pkg.revision}${pkg.subdirectory ? ` (${pkg.subdirectory})` : ""}`;
    case "local":
      return pkg.local;
  }
}

export function describePackages(doc: ProjectDocument): string[] {
  return doc.packages.map((pkg) => `[${pkg.kind}] ${describePackage(pkg)}`);
}

/** Appends; an existing entry for the same package is not detected. */
export function addHubPackage(doc: ProjectDocument, name: string, version: VersionConstraint): ProjectOutcome {
  return attempt(() => {
    const pkg: PackageRef = {
      kind: "hub",
      package: validateHubPackageName(requireText("package", name)),
      version: validConstraint("version", version),
    };
    return applied(withPackages(doc, [...doc.packages, pkg]), `Added package ${describePackage(pkg)}`);
  });
}

export function addGitPackage(doc: ProjectDocument, git: string, revision: string, subdirectory?: string): ProjectOutcome {
  return attempt(() => {
    const pkg: GitPackage = { kind: "git", git: requireText("git", git), revision: requireText("revision", revision) };
    if (subdirectory !== undefined && subdirectory.trim()) pkg.subdirectory = subdirectory.trim();
    return applied(withPackages(doc, [...doc.packages, pkg]), `Added git package ${describePackage(pkg)}`);
  });
}

export function addLocalPackage(doc: ProjectDocument, local: string): ProjectOutcome {
  return attempt(() => {
    const pkg: PackageRef = { kind: "local", local: requireText("local", local) };
    return applied(withPackages(doc, [...doc.packages, pkg]), `Added local package ${pkg.local}`);
  });
}

function findPackage(doc: ProjectDocument, identity: string): number {
  const index = doc.packages.findIndex((pkg) => packageIdentity(pkg) === identity);
  if (index === -1) throw new NotFoundError("package", identity);
  return index;
}

/** Removes the first entry whose identity matches. */
export function removePackage(doc: ProjectDocument, identity: string): ProjectOutcome {
  return attempt(() => {
    const index = findPackage(doc, identity);
    const packages = doc.packages.filter((_, i) => i !== index);
    return applied(withPackages(doc, packages), `Removed package '${identity}'`);
  });
}

export function updatePackageVersion(doc: ProjectDocument, name: string, version: VersionConstraint): ProjectOutcome {
  return attempt(() => {
    const index = findPackage(doc, name);
    const pkg = doc.packages[index];
    if (pkg.kind !== "hub") throw new WrongPackageKindError(name, pkg.kind);
    const value = validConstraint("version", version);
    const packages = doc.packages.map((p, i) => (i === index ? { ...pkg, version: value } : p));
    return applied(withPackages(doc, packages), `Updated '${name}' to ${formatConstraint(value)}`);
  });
}
