/**
 * `dbtkit dbt project` — init, show, edit dbt_project.yml and packages.yml.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { Flags, UsageError, parseFlags, splitConstraint, type FlagSpec } from "../lib/args.js";
import { readCache, rememberProject } from "../lib/cache.js";
import type { CommandContext } from "../lib/context.js";
import { loadProfiles, loadProject, saveProject } from "../lib/documents.js";
import { unwrap, type EditOutcome } from "../lib/edit-result.js";
import { NotFoundError, ValidationError } from "../lib/errors.js";
import { findDbtProjects, searchRoot } from "../lib/finder.js";
import { DEFAULT_PACKAGE, FALLBACK_RANGE, KNOWN_PACKAGES, packageVersions, resolvePackageName } from "../lib/hub.js";
import { isJsonMode, output } from "../lib/output.js";
import {
  addGitPackage,
  addHubPackage,
  addLocalPackage,
  addPath,
  describePackages,
  formatConstraint,
  removePackage,
  removePath,
  setName,
  setProfile,
  setRequireDbtVersion,
  setVersion,
  updatePackageVersion,
} from "../lib/project-editor.js";
import { PATH_FIELDS, type HubPackage, type ProjectDocument, type VersionConstraint } from "../lib/project-schema.js";
import { checkProjectTarget, initProject } from "../lib/scaffold.js";
import { resolveProfilePath, resolveProjectBaseDir, resolveProjectDir } from "../lib/settings.js";
import { MATERIALIZATIONS, isMaterialization } from "../lib/templates.js";
import type { Prompter } from "../lib/prompts.js";
import { ProjectWizard, askProjectInit, pickDiscoveredProject, type ProjectInitAnswers } from "../tui/project-wizard.js";

export const PROJECT_ACTIONS = [
  "set-name",
  "set-profile",
  "set-version",
  "set-require-dbt-version",
  "add-path",
  "remove-path",
  "add-hub-package",
  "add-git-package",
  "add-local-package",
  "remove-package",
  "update-package-version",
] as const;
export type ProjectAction = (typeof PROJECT_ACTIONS)[number];

function isProjectAction(value: string): value is ProjectAction {
  return PROJECT_ACTIONS.some((a) => a === value);
}

const PROJECT_FLAG: FlagSpec = { name: "project", alias: "p", type: "string" };

const EDIT_FLAGS: FlagSpec[] = [
  PROJECT_FLAG,
  { name: "action", type: "string" },
  { name: "name", type: "string" },
  { name: "profile", type: "string" },
  { name: "version", type: "string" },
  { name: "require-dbt-version", type: "string" },
  { name: "path-field", type: "string" },
  { name: "path", type: "string" },
  { name: "create-dir", type: "boolean" },
  { name: "package", type: "string" },
  { name: "package-version", type: "string" },
  { name: "git", type: "string" },
  { name: "revision", type: "string" },
  { name: "subdirectory", type: "string" },
  { name: "local", type: "string" },
];

const INIT_FLAGS: FlagSpec[] = [
  { name: "project-name", alias: "n", type: "string" },
  { name: "base-dir", alias: "b", type: "string" },
  { name: "team", alias: "t", type: "string" },
  { name: "profile", alias: "p", type: "string" },
  { name: "profile-path", type: "string" },
  { name: "packages", type: "list" },
  { name: "no-packages", type: "boolean" },
  { name: "materialization", type: "string" },
  { name: "persist-docs", type: "boolean", negatable: true },
  { name: "run-deps", type: "boolean", negatable: true },
  { name: "with-example", type: "boolean" },
  { name: "no-example", type: "boolean" },
  { name: "force", alias: "f", type: "boolean" },
];

/** Hub entries with their version ranges, looked up on dbt Hub. */
export async function hubPackages(names: readonly string[], ctx: CommandContext): Promise<HubPackage[]> {
  const unique = [...new Set(names)];
  const versions = await packageVersions(unique, ctx.logger, ctx.fetcher);
  return unique.map((name) => ({ kind: "hub", package: name, version: versions.get(name) ?? [...FALLBACK_RANGE] }));
}

async function projectDir(flags: Flags, ctx: CommandContext): Promise<string> {
  const resolved = await resolveProjectDir({
    explicit: flags.string("project"),
    env: ctx.env,
    cache: await readCache(ctx.cacheFile),
    cwd: ctx.cwd,
  });
  ctx.logger.debug("project directory", { dir: resolved.value, source: resolved.source });
  return resolved.value;
}

// ── edit ─────────────────────────────────────────────────────────────

async function buildEdit(
  action: ProjectAction,
  flags: Flags,
  doc: ProjectDocument,
  dir: string,
  ctx: CommandContext,
): Promise<EditOutcome<ProjectDocument>> {
  switch (action) {
    case "set-name":
      return setName(doc, flags.require("name", "for set-name"));
    case "set-profile":
      return setProfile(doc, flags.require("profile", "for set-profile"));
    case "set-version":
      return setVersion(doc, flags.require("version", "for set-version"));
    case "set-require-dbt-version": {
      // An empty value removes the constraint.
      const value = flags.string("require-dbt-version");
      if (value === undefined) throw new UsageError("--require-dbt-version is required for set-require-dbt-version");
      return setRequireDbtVersion(doc, value.trim() ? splitConstraint(value) : undefined);
    }
    case "add-path": {
      const field = flags.require("path-field", "for add-path");
      const value = flags.require("path", "for add-path");
      const outcome = addPath(doc, field, value);
      if (outcome.status === "applied" && flags.boolean("create-dir")) {
        await fs.mkdir(path.resolve(dir, value), { recursive: true });
      }
      return outcome;
    }
    case "remove-path":
      return removePath(doc, flags.require("path-field", "for remove-path"), flags.require("path", "for remove-path"));
    case "add-hub-package": {
      const name = resolvePackageName(flags.require("package", "for add-hub-package"));
      const given = flags.string("package-version");
      const version: VersionConstraint = given
        ? splitConstraint(given)
        : (await hubPackages([name], ctx))[0].version;
      return addHubPackage(doc, name, version);
    }
    case "add-git-package":
      return addGitPackage(
        doc,
        flags.require("git", "for add-git-package"),
        flags.require("revision", "for add-git-package"),
        flags.string("subdirectory"),
      );
    case "add-local-package":
      return addLocalPackage(doc, flags.require("local", "for add-local-package"));
    case "remove-package":
      return removePackage(doc, packageFlag(flags, "remove-package"));
    case "update-package-version":
      return updatePackageVersion(
        doc,
        packageFlag(flags, "update-package-version"),
        splitConstraint(flags.require("package-version", "for update-package-version")),
      );
  }
}

/** `--package` names a hub package (short names allowed), git URL or local path. */
function packageFlag(flags: Flags, action: string): string {
  const value = flags.require("package", `for ${action}`);
  return KNOWN_PACKAGES[value] ?? value;
}

/** Like projectDir, but offers projects found below the search root when none encloses cwd. */
async function projectDirOrDiscover(flags: Flags, ctx: CommandContext, prompter: Prompter): Promise<string | undefined> {
  try {
    return await projectDir(flags, ctx);
  } catch (err) {
    if (!(err instanceof NotFoundError) || flags.string("project") !== undefined) throw err;
  }
  const root = await searchRoot(ctx.cwd);
  ctx.logger.debug("searching for projects", { root });
  return pickDiscoveredProject(prompter, root, await findDbtProjects(root));
}

async function interactiveEdit(flags: Flags, ctx: CommandContext, openPrompter: () => Prompter): Promise<void> {
  const prompter = openPrompter();
  try {
    const dir = await projectDirOrDiscover(flags, ctx, prompter);
    if (dir === undefined) return;
    const loaded = await loadProject(dir);
    console.log(`Editing ${dir}`);
    await new ProjectWizard(loaded.document, {
      prompter,
      logger: ctx.logger,
      save: (doc) => saveProject(dir, doc),
    }).run();
    await rememberProject(ctx.cacheFile, dir);
  } finally {
    prompter.close();
  }
}

async function editCommand(rest: string[], ctx: CommandContext): Promise<void> {
  const flags = parseFlags(rest, EDIT_FLAGS);
  const action = flags.string("action");

  if (action === undefined) {
    if (!ctx.openPrompter) throw new UsageError("--action is required when not running in a terminal");
    return interactiveEdit(flags, ctx, ctx.openPrompter);
  }
  if (!isProjectAction(action)) {
    throw new UsageError(`Unknown action: ${action}\nValid actions: ${PROJECT_ACTIONS.join(", ")}`);
  }

  const dir = await projectDir(flags, ctx);
  const loaded = await loadProject(dir);

  const result = unwrap(await buildEdit(action, flags, loaded.document, dir, ctx));
  if (result.document !== loaded.document) await saveProject(dir, result.document);
  await rememberProject(ctx.cacheFile, dir);
  ctx.logger.info(`project edit ${action}`, { dir });

  if (isJsonMode()) {
    output({ action, dir, summary: result.summary, changed: result.document !== loaded.document, note: result.note });
  } else {
    console.log(`✓ ${result.summary}${result.note ? ` (${result.note})` : ""}`);
  }
}

// ── show ─────────────────────────────────────────────────────────────

export function formatProject(dir: string, doc: ProjectDocument): string {
  const lines = [
    `Project: ${doc.name} ${doc.version}`,
    `Directory: ${dir}`,
    `Profile: ${doc.profile}`,
  ];
  if (doc.requireDbtVersion !== undefined) lines.push(`Requires dbt: ${formatConstraint(doc.requireDbtVersion)}`);
  lines.push("Paths:");
  for (const field of PATH_FIELDS) lines.push(`  ${field}: ${doc.paths[field].join(", ") || "(none)"}`);
  lines.push("Packages:");
  const packages = describePackages(doc);
  lines.push(...(packages.length ? packages.map((p) => `  ${p}`) : ["  (none)"]));
  return lines.join("\n");
}

// ── init ─────────────────────────────────────────────────────────────

async function initAnswers(flags: Flags, ctx: CommandContext, profilePath: string): Promise<ProjectInitAnswers> {
  const baseDir = resolveProjectBaseDir(flags.string("base-dir"), ctx.env, ctx.cwd).value;
  const name = flags.string("project-name");

  if (name === undefined) {
    if (!ctx.openPrompter) throw new UsageError("-n/--project-name is required when not running in a terminal");
    const profiles = Object.keys((await loadProfiles(profilePath)).document);
    const prompter = ctx.openPrompter();
    try {
      return await askProjectInit(prompter, { profile: flags.string("profile"), baseDir, profiles });
    } finally {
      prompter.close();
    }
  }

  const profile = flags.require("profile", "when --project-name is given");
  const materialization = flags.string("materialization") ?? "view";
  if (!isMaterialization(materialization)) {
    throw new ValidationError("materialization", `must be one of ${MATERIALIZATIONS.join(", ")}`);
  }
  const packages = flags.boolean("no-packages")
    ? []
    : [DEFAULT_PACKAGE, ...flags.list("packages").map(resolvePackageName)];

  return {
    name,
    profile,
    baseDir,
    team: flags.string("team"),
    packages,
    materialization,
    persistDocs: flags.boolean("persist-docs") ?? false,
    withExample: (flags.boolean("with-example") ?? false) && !flags.boolean("no-example"),
    runDeps: flags.boolean("run-deps") ?? false,
  };
}

async function initCommand(rest: string[], ctx: CommandContext): Promise<void> {
  const flags = parseFlags(rest, INIT_FLAGS);
  const profilePath = resolveProfilePath(flags.string("profile-path"), ctx.env).value;
  const answers = await initAnswers(flags, ctx, profilePath);
  const force = flags.boolean("force") ?? false;
  // fail on a taken directory before waiting on dbt Hub
  await checkProjectTarget({ ...answers, force });

  const result = await initProject({
    name: answers.name,
    profile: answers.profile,
    baseDir: answers.baseDir,
    team: answers.team,
    packages: await hubPackages(answers.packages, ctx),
    materialization: answers.materialization,
    persistDocs: answers.persistDocs,
    withExample: answers.withExample,
    force,
  });
  await rememberProject(ctx.cacheFile, result.directory);
  ctx.logger.info("project created", { dir: result.directory });

  let depsExitCode: number | undefined;
  if (answers.runDeps && answers.packages.length) {
    depsExitCode = await ctx.runner.run(["deps"], {
      cwd: result.directory,
      env: ctx.env,
      profilesDir: path.dirname(profilePath),
    });
  }

  if (isJsonMode()) {
    output({ ...result, depsExitCode });
    return;
  }
  console.log(`✓ Created project ${answers.name} at ${result.directory}`);
  for (const file of result.created) console.log(`  ${file}`);
  if (depsExitCode === undefined) {
    if (answers.packages.length) console.log(`\nRun 'dbt deps' in ${result.directory}`);
  } else if (depsExitCode !== 0) {
    console.log(`\n✗ dbt deps exited with code ${depsExitCode}; run it again in ${result.directory}`);
  }
}

// ── dispatch ─────────────────────────────────────────────────────────

export async function projectCommand(sub: string | undefined, rest: string[], ctx: CommandContext): Promise<void> {
  switch (sub) {
    case "init":
      return initCommand(rest, ctx);

    case "show": {
      const flags = parseFlags(rest, [PROJECT_FLAG]);
      const dir = await projectDir(flags, ctx);
      const loaded = await loadProject(dir);
      await rememberProject(ctx.cacheFile, dir);
      if (isJsonMode()) {
        output({ dir, hasPackagesFile: loaded.hasPackagesFile, project: loaded.document });
      } else {
        console.log(formatProject(dir, loaded.document));
      }
      return;
    }

    case "edit":
      return editCommand(rest, ctx);

    case "help":
    case "--help":
    case "-h":
    case undefined:
      printProjectHelp();
      return;

    default:
      throw new UsageError(`Unknown project command: ${sub}\nRun 'dbtkit dbt project --help' for usage.`);
  }
}

function printProjectHelp(): void {
  console.log(`Usage: dbtkit dbt project <command> [options]

Commands:
  init -n NAME -p PROFILE [options]   Create a new dbt project (wizard without -n)
  show [-p DIR]                       Print the project summary
  edit [-p DIR]                       Interactive editor (in a terminal)
  edit --action ACTION ...            Scripted edit

Init options:
  -b, --base-dir DIR          Parent directory (env: DBTKIT_PROJECT_BASE_DIR)
  -t, --team NAME             Team subdirectory under the base directory
  --packages NAME             Extra dbt Hub package (repeatable; short names allowed)
  --no-packages               Do not add ${DEFAULT_PACKAGE}
  --materialization M         ${MATERIALIZATIONS.join(" | ")} (default view)
  --persist-docs              Persist docs to the warehouse
  --with-example              Add an example model
  --run-deps                  Run 'dbt deps' afterwards
  --profile-path P            profiles.yml used for 'dbt deps'
  -f, --force                 Write into an existing directory

Actions:
  set-name                  --name NAME
  set-profile               --profile NAME
  set-version               --version X.Y.Z
  set-require-dbt-version   --require-dbt-version ">=1.7.0,<2.0.0" (empty removes)
  add-path                  --path-field FIELD --path P [--create-dir]
  remove-path               --path-field FIELD --path P
  add-hub-package           --package NAME [--package-version V]
  add-git-package           --git URL --revision REV [--subdirectory DIR]
  add-local-package         --local PATH
  remove-package            --package NAME|URL|PATH
  update-package-version    --package NAME --package-version V

Path fields: ${PATH_FIELDS.join(", ")}
The project defaults to the nearest dbt_project.yml at or above the current
directory, or the last project used when outside one (env: DBTKIT_PROJECT_PATH).`);
}
