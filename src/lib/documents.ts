/**
 * Load and save the two documents as whole files.
 *
 * Loading decodes through the codec; saving checks the profile invariants,
 * encodes, and replaces the file(s) atomically.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { NotFoundError } from "./errors.js";
import { writeFileAtomic, writeFilesAtomic, defaultIo, type AtomicWriteIo, type PendingFile } from "./atomic-write.js";
import { checkProfileInvariants, type ProfileDocument } from "./profile-schema.js";
import type { ProjectDocument } from "./project-schema.js";
import { decodeProfiles, decodeProject, encodeProfiles, encodeProject } from "./yaml-codec.js";

export const PROJECT_FILE = "dbt_project.yml";
export const PACKAGES_FILE = "packages.yml";

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** File contents, or undefined when the file does not exist. */
export async function readOptional(file: string): Promise<string | undefined> {
  try {
    return await fs.readFile(file, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return undefined;
    throw err;
  }
}

export async function fileExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

// ── profiles ─────────────────────────────────────────────────────────

export interface LoadedProfiles {
  path: string;
  exists: boolean;
  document: ProfileDocument;
}

/** A missing profiles file loads as an empty document. */
export async function loadProfiles(file: string): Promise<LoadedProfiles> {
  const text = await readOptional(file);
  if (text === undefined) return { path: file, exists: false, document: {} };
  return { path: file, exists: true, document: decodeProfiles(text) };
}

/** Strict variant for commands that only make sense on an existing file. */
export async function requireProfiles(file: string): Promise<LoadedProfiles> {
  const loaded = await loadProfiles(file);
  if (!loaded.exists) {
    throw new NotFoundError("file", file, `Profile file not found: ${file} (run 'dbtkit dbt profile init')`);
  }
  return loaded;
}

export async function saveProfiles(file: string, doc: ProfileDocument, io: AtomicWriteIo = defaultIo): Promise<void> {
  checkProfileInvariants(doc);
  await writeFileAtomic(file, encodeProfiles(doc), io);
}

// ── project ──────────────────────────────────────────────────────────

export interface LoadedProject {
  dir: string;
  hasPackagesFile: boolean;
  document: ProjectDocument;
}

export async function loadProject(dir: string): Promise<LoadedProject> {
  const projectText = await readOptional(path.join(dir, PROJECT_FILE));
  if (projectText === undefined) {
    throw new NotFoundError("project", dir, `no project found: ${path.join(dir, PROJECT_FILE)} does not exist`);
  }
  const packagesText = await readOptional(path.join(dir, PACKAGES_FILE));
  return {
    dir,
    hasPackagesFile: packagesText !== undefined,
    document: decodeProject(projectText, packagesText),
  };
}

/**
 * packages.yml is written alongside dbt_project.yml when it already exists
 * or the project has packages; both files are replaced together.
 */
export async function saveProject(
  dir: string,
  doc: ProjectDocument,
  io: AtomicWriteIo = defaultIo,
): Promise<void> {
  const encoded = encodeProject(doc);
  const files: PendingFile[] = [{ path: path.join(dir, PROJECT_FILE), content: encoded.project }];
  const packagesPath = path.join(dir, PACKAGES_FILE);
  if (doc.packages.length || (await fileExists(packagesPath))) {
    files.push({ path: packagesPath, content: encoded.packages });
  }
  await writeFilesAtomic(files, io);
}
