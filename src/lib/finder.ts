/**
 * Project discovery — upward from a directory to the nearest dbt_project.yml,
 * and downward through a repository to list every project in it.
 */

import { execFile } from "child_process";
import { promisify } from "util";
import type { Dirent } from "fs";
import * as fs from "fs/promises";
import * as path from "path";
import { NotFoundError } from "./errors.js";
import { PROJECT_FILE, fileExists } from "./documents.js";

const execFileAsync = promisify(execFile);

export const DEFAULT_MAX_DEPTH = 10;

/** Directories never descended into while looking for projects. */
export const EXCLUDE_DIRS: ReadonlySet<string> = new Set([
  ".git",
  ".venv",
  "venv",
  ".env",
  "node_modules",
  "dbt_packages",
  "target",
  "__pycache__",
  ".mypy_cache",
  ".pytest_cache",
  ".ruff_cache",
]);

/** Absolute path of the nearest dbt_project.yml at or above `startDir`. */
export async function findProjectFile(startDir: string): Promise<string> {
  let dir = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(dir, PROJECT_FILE);
    if (await fileExists(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  throw new NotFoundError(
    "project",
    startDir,
    `no project found: no ${PROJECT_FILE} in ${path.resolve(startDir)} or any parent directory`,
  );
}

/** Sorted absolute paths of every dbt_project.yml below `root`, skipping EXCLUDE_DIRS. */
export async function findDbtProjects(root: string, maxDepth = DEFAULT_MAX_DEPTH): Promise<string[]> {
  const found: string[] = [];

  async function walk(dir: string, depth: number): Promise<void> {
    if (depth > maxDepth) return;
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch {
      return; // unreadable directory
    }
    for (const entry of entries) {
      if (entry.isDirectory()) {
        if (!EXCLUDE_DIRS.has(entry.name)) await walk(path.join(dir, entry.name), depth + 1);
      } else if (entry.isFile() && entry.name === PROJECT_FILE) {
        found.push(path.join(dir, entry.name));
      }
    }
  }

  await walk(path.resolve(root), 0);
  return found.sort();
}

/** The enclosing git work tree, or `cwd` itself outside of one. */
export async function searchRoot(cwd: string): Promise<string> {
  try {
    const { stdout } = await execFileAsync("git", ["rev-parse", "--show-toplevel"], { cwd, timeout: 5000 });
    const top = stdout.trim();
    return top || path.resolve(cwd);
  } catch {
    return path.resolve(cwd);
  }
}
