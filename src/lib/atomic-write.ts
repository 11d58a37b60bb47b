/**
 * Whole-file replace: write a temp sibling, then rename over the target.
 * A failure at any step removes the temp file and leaves the target as it was.
 *
 * A target that is a symlink is written through: the temp file sits next to
 * the file the link points at, and the link itself is kept. An existing
 * target's permission bits carry over to the new file.
 */

import * as fs from "fs/promises";
import * as path from "path";

/** The file operations used, swappable so tests can fail one midway. */
export interface AtomicWriteIo {
  writeFile(file: string, data: string, mode?: number): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  rm(file: string): Promise<void>;
}

export const defaultIo: AtomicWriteIo = {
  async writeFile(file, data, mode) {
    await fs.writeFile(file, data, { encoding: "utf-8", mode });
    // the mode given to writeFile is filtered by the umask
    if (mode !== undefined) await fs.chmod(file, mode);
  },
  rename: (from, to) => fs.rename(from, to),
  rm: (file) => fs.rm(file, { force: true }),
};

export function tempPathFor(target: string): string {
  const suffix = `${process.pid}.${Date.now().toString(36)}.${Math.random().toString(36).slice(2, 8)}`;
  return path.join(path.dirname(target), `.${path.basename(target)}.${suffix}.tmp`);
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

interface WriteTarget {
  /** The file actually replaced, after following symlinks. */
  path: string;
  /** Permission bits of the existing file. */
  mode?: number;
  /** Contents before the write, for rolling back a group. */
  previous?: string;
}

/** Follows symlinks (dangling ones too) and reads what is there now. */
export async function resolveWriteTarget(file: string): Promise<WriteTarget> {
  let target = file;
  try {
    const stat = await fs.lstat(file);
    if (stat.isSymbolicLink()) {
      target = await fs.realpath(file).catch(async (err: unknown) => {
        if (!isMissing(err)) throw err;
        return path.resolve(path.dirname(file), await fs.readlink(file));
      });
    }
  } catch (err) {
    if (!isMissing(err)) throw err;
    return { path: file };
  }
  try {
    const [stat, previous] = await Promise.all([fs.stat(target), fs.readFile(target, "utf-8")]);
    return { path: target, mode: stat.mode & 0o7777, previous };
  } catch (err) {
    if (!isMissing(err)) throw err;
    return { path: target };
  }
}

export async function writeFileAtomic(target: string, content: string, io: AtomicWriteIo = defaultIo): Promise<void> {
  await writeFilesAtomic([{ path: target, content }], io);
}

export interface PendingFile {
  path: string;
  content: string;
}

/**
 * Several files that belong together (dbt_project.yml + packages.yml).
 * Every temp file is written before the first rename, so a failed write
 * leaves all targets untouched. When a later rename fails, the targets
 * already replaced get their previous contents back (or are removed if they
 * did not exist); if that restore fails too, both errors are thrown together.
 */
export async function writeFilesAtomic(files: readonly PendingFile[], io: AtomicWriteIo = defaultIo): Promise<void> {
  const staged: { tmp: string; target: WriteTarget }[] = [];
  const replaced: WriteTarget[] = [];
  try {
    for (const file of files) {
      await fs.mkdir(path.dirname(file.path), { recursive: true });
      const target = await resolveWriteTarget(file.path);
      const tmp = tempPathFor(target.path);
      staged.push({ tmp, target });
      await io.writeFile(tmp, file.content, target.mode);
    }
    while (staged.length) {
      const [next] = staged;
      await io.rename(next.tmp, next.target.path);
      staged.shift();
      replaced.push(next.target);
    }
  } catch (err) {
    for (const { tmp } of staged) await io.rm(tmp);
    try {
      await restore(replaced, io);
    } catch (restoreErr) {
      throw new AggregateError([err, restoreErr], `write failed and restoring the previous files failed`);
    }
    throw err;
  }
}

async function restore(targets: readonly WriteTarget[], io: AtomicWriteIo): Promise<void> {
  for (const target of targets) {
    if (target.previous === undefined) {
      await io.rm(target.path);
      continue;
    }
    const tmp = tempPathFor(target.path);
    await io.writeFile(tmp, target.previous, target.mode);
    await io.rename(tmp, target.path);
  }
}
