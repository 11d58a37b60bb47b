/**
 * YAML text <-> typed documents.
 *
 * Decoding parses with `yaml` and hands the plain tree to the schema model.
 * Encoding rebuilds each node in a fixed key order before stringifying, so
 * the same in-memory value always produces the same bytes and
 * `decode(encode(d))` deep-equals `d`.
 */

import { isMap, isScalar, isSeq, parseDocument, stringify, type Document } from "yaml";
import { MalformedDocumentError } from "./errors.js";
import { parseProfileDocument, type Output, type Profile, type ProfileDocument } from "./profile-schema.js";
import {
  PATH_FIELDS,
  parseProjectDocument,
  type PackageRef,
  type ProjectDocument,
} from "./project-schema.js";

const STRINGIFY_OPTIONS = { indent: 2, lineWidth: 120 } as const;

function parseYamlDocument(text: string): Document.Parsed {
  const doc = parseDocument(text);
  const [err] = doc.errors;
  if (err) {
    const pos = err.linePos?.[0];
    const reason = err.message.split("\n")[0].replace(/ at line \d+, column \d+:?$/, "");
    throw new MalformedDocumentError(reason, pos?.line, pos?.col);
  }
  return doc;
}

/** Parse YAML into a plain tree. Syntax errors carry line/column when the parser reports them. */
export function parseYaml(text: string): unknown {
  const tree: unknown = parseYamlDocument(text).toJS();
  return tree;
}

const PROJECT_VERSION_KEYS: ReadonlySet<string> = new Set(["version", "require-dbt-version"]);
const PACKAGE_VERSION_KEYS: ReadonlySet<string> = new Set(["version", "revision"]);

/**
 * An unquoted `version: 1.10` parses as the number 1.1; under these keys a
 * number is replaced by the text it was written as.
 */
function keepWrittenText(node: unknown, keys: ReadonlySet<string>): void {
  if (!isMap(node)) return;
  for (const pair of node.items) {
    if (!isScalar(pair.key) || typeof pair.key.value !== "string" || !keys.has(pair.key.value)) continue;
    const values = isSeq(pair.value) ? pair.value.items : [pair.value];
    for (const value of values) {
      if (isScalar(value) && typeof value.value === "number" && value.source !== undefined) {
        value.value = value.source;
      }
    }
  }
}

function parseProjectYaml(text: string): unknown {
  const doc = parseYamlDocument(text);
  keepWrittenText(doc.contents, PROJECT_VERSION_KEYS);
  const tree: unknown = doc.toJS();
  return tree;
}

function parsePackagesYaml(text: string): unknown {
  const doc = parseYamlDocument(text);
  if (isMap(doc.contents)) {
    const packages = doc.contents.get("packages", true);
    if (isSeq(packages)) {
      for (const entry of packages.items) keepWrittenText(entry, PACKAGE_VERSION_KEYS);
    }
  }
  const tree: unknown = doc.toJS();
  return tree;
}

// ── profiles ─────────────────────────────────────────────────────────

export function decodeProfiles(text: string): ProfileDocument {
  return parseProfileDocument(parseYaml(text));
}

export function encodeProfiles(doc: ProfileDocument): string {
  const tree: Record<string, unknown> = {};
  for (const [name, profile] of Object.entries(doc)) {
    tree[name] = profileNode(profile);
  }
  return stringify(tree, STRINGIFY_OPTIONS);
}

function profileNode(profile: Profile): Record<string, unknown> {
  const outputs: Record<string, unknown> = {};
  for (const [name, output] of Object.entries(profile.outputs)) {
    outputs[name] = outputNode(output);
  }
  return compact({ target: profile.target, outputs });
}

export function outputNode(output: Output): Record<string, unknown> {
  switch (output.type) {
    case "duckdb":
      return compact({
        type: output.type,
        path: output.path,
        threads: output.threads,
        schema: output.schema,
        database: output.database,
        extensions: output.extensions,
        settings: output.settings,
      });
    case "databricks":
      return compact({
        type: output.type,
        host: output.host,
        http_path: output.http_path,
        catalog: output.catalog,
        schema: output.schema,
        auth_type: output.auth_type,
        client_id: output.client_id,
        client_secret: output.client_secret,
        token: output.token,
        threads: output.threads,
      });
  }
}

// ── project ──────────────────────────────────────────────────────────

/** `packagesText` is the sibling packages.yml; omit it when the file does not exist. */
export function decodeProject(projectText: string, packagesText?: string): ProjectDocument {
  const raw = parseProjectYaml(projectText);
  const rawPackages = packagesText === undefined ? undefined : parsePackagesYaml(packagesText);
  return parseProjectDocument(raw, rawPackages);
}

export interface EncodedProject {
  project: string;
  packages: string;
}

export function encodeProject(doc: ProjectDocument): EncodedProject {
  const tree: Record<string, unknown> = compact({
    name: doc.name,
    version: doc.version,
    profile: doc.profile,
    "require-dbt-version": doc.requireDbtVersion,
  });
  for (const field of PATH_FIELDS) {
    tree[field] = doc.paths[field];
  }
  for (const [key, value] of Object.entries(doc.extra)) {
    tree[key] = value;
  }
  return {
    project: stringify(tree, STRINGIFY_OPTIONS),
    packages: encodePackages(doc.packages),
  };
}

export function encodePackages(packages: readonly PackageRef[]): string {
  return stringify({ packages: packages.map(packageNode) }, STRINGIFY_OPTIONS);
}

function packageNode(pkg: PackageRef): Record<string, unknown> {
  switch (pkg.kind) {
    case "hub":
      return { package: pkg.package, version: pkg.version };
    case "git":
      return compact({ git: pkg.git, revision: pkg.revision, subdirectory: pkg.subdirectory });
    case "local":
      return { local: pkg.local };
  }
}

/** Drop undefined values, keeping key order. */
function compact(node: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(node)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}
