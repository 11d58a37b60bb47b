/**
 * `profile init` and `project init` — write starter files to disk.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { DuplicateNameError } from "./errors.js";
import { writeFileAtomic, writeFilesAtomic, type PendingFile } from "./atomic-write.js";
import { PACKAGES_FILE, PROJECT_FILE, fileExists, saveProfiles } from "./documents.js";
import { PATH_FIELDS, ProjectNameSchema, type PackageRef } from "./project-schema.js";
import { toValidationError } from "./schema-issues.js";
import { encodeProject } from "./yaml-codec.js";
import {
  EXAMPLE_MODEL,
  EXAMPLE_MODEL_PATH,
  EXAMPLE_SCHEMA,
  EXAMPLE_SCHEMA_PATH,
  GITIGNORE,
  starterProfiles,
  starterProject,
  type Materialization,
} from "./templates.js";

export async function initProfile(file: string, force = false): Promise<{ path: string; overwritten: boolean }> {
  const exists = await fileExists(file);
  if (exists && !force) {
    throw new DuplicateNameError("file", file, `Profile file already exists: ${file} (use --force to overwrite)`);
  }
  await saveProfiles(file, starterProfiles());
  return { path: file, overwritten: exists };
}

export interface ProjectInitOptions {
  name: string;
  profile: string;
  baseDir: string;
  team?: string;
  packages: PackageRef[];
  materialization?: Materialization;
  persistDocs?: boolean;
  withExample?: boolean;
  force?: boolean;
}

export interface ProjectInitResult {
  directory: string;
  created: string[];
}

export function projectDirFor(options: Pick<ProjectInitOptions, "baseDir" | "team" | "name">): string {
  return options.team
    ? path.resolve(options.baseDir, options.team, options.name)
    : path.resolve(options.baseDir, options.name);
}

/** Checks the name and that the target directory is free (or `force`); returns the directory. */
export async function checkProjectTarget(
  options: Pick<ProjectInitOptions, "baseDir" | "team" | "name" | "force">,
): Promise<string> {
  const named = ProjectNameSchema.safeParse(options.name);
  if (!named.success) throw toValidationError(named.error, ["name"]);

  const directory = projectDirFor(options);
  if ((await fileExists(directory)) && !options.force) {
    throw new DuplicateNameError("project", directory, `Project directory already exists: ${directory} (use --force to overwrite)`);
  }
  return directory;
}

/** Creates `<base>/[team/]<name>/`. An existing directory needs `force`. */
export async function initProject(options: ProjectInitOptions): Promise<ProjectInitResult> {
  const directory = await checkProjectTarget(options);

  const doc = starterProject(options);
  const encoded = encodeProject(doc);
  const files: PendingFile[] = [{ path: path.join(directory, PROJECT_FILE), content: encoded.project }];
  if (doc.packages.length) files.push({ path: path.join(directory, PACKAGES_FILE), content: encoded.packages });
  await writeFilesAtomic(files);

  const created = files.map((f) => path.relative(directory, f.path));

  for (const field of PATH_FIELDS) {
    for (const dir of doc.paths[field]) {
      const keep = path.join(directory, dir, ".gitkeep");
      await fs.mkdir(path.dirname(keep), { recursive: true });
      if (!(await fileExists(keep))) {
        await fs.writeFile(keep, "", "utf-8");
        created.push(path.relative(directory, keep));
      }
    }
  }

  const extras: Record<string, string> = { ".gitignore": GITIGNORE };
  if (options.withExample) {
    extras[EXAMPLE_MODEL_PATH] = EXAMPLE_MODEL;
    extras[EXAMPLE_SCHEMA_PATH] = EXAMPLE_SCHEMA;
  }
  for (const [rel, content] of Object.entries(extras)) {
    await writeFileAtomic(path.join(directory, rel), content);
    created.push(rel);
  }

  return { directory, created };
}
