/**
 * Interactive project editing and creation — `dbtkit dbt project edit` and
 * `dbtkit dbt project init` without flags.
 */

import * as path from "path";
import { splitConstraint } from "../lib/args.js";
import type { EditOutcome } from "../lib/edit-result.js";
import { POPULAR_PACKAGES, DEFAULT_PACKAGE, resolvePackageName } from "../lib/hub.js";
import type { Logger } from "../lib/logger.js";
import {
  addGitPackage,
  addHubPackage,
  addLocalPackage,
  addPath,
  describePackages,
  packageIdentity,
  removePackage,
  removePath,
  setName,
  setProfile,
  setRequireDbtVersion,
  setVersion,
  updatePackageVersion,
} from "../lib/project-editor.js";
import { PATH_FIELDS, PROJECT_NAME_PATTERN, NAME_RULE, type PathField, type ProjectDocument } from "../lib/project-schema.js";
import type { Choice, Prompter } from "../lib/prompts.js";
import { MATERIALIZATIONS, type Materialization } from "../lib/templates.js";

export type ProjectMenuAction =
  | "set-name"
  | "set-profile"
  | "set-version"
  | "set-require-dbt-version"
  | "add-path"
  | "remove-path"
  | "add-hub-package"
  | "add-git-package"
  | "add-local-package"
  | "remove-package"
  | "update-package-version"
  | "exit";

const MENU: Choice<ProjectMenuAction>[] = [
  { value: "set-name", label: "Set name" },
  { value: "set-profile", label: "Set profile" },
  { value: "set-version", label: "Set version" },
  { value: "set-require-dbt-version", label: "Set required dbt version" },
  { value: "add-path", label: "Add a path" },
  { value: "remove-path", label: "Remove a path" },
  { value: "add-hub-package", label: "Add dbt Hub package" },
  { value: "add-git-package", label: "Add git package" },
  { value: "add-local-package", label: "Add local package" },
  { value: "remove-package", label: "Remove package" },
  { value: "update-package-version", label: "Update package version" },
  { value: "exit", label: "Exit" },
];

export interface ProjectWizardDeps {
  prompter: Prompter;
  logger: Logger;
  save(doc: ProjectDocument): Promise<void>;
}

function required(value: string): string | undefined {
  return value ? undefined : "a value is required";
}

export class ProjectWizard {
  private doc: ProjectDocument;

  constructor(
    doc: ProjectDocument,
    private deps: ProjectWizardDeps,
  ) {
    this.doc = doc;
  }

  get document(): ProjectDocument {
    return this.doc;
  }

  async run(): Promise<ProjectDocument> {
    for (;;) {
      console.log(`\nProject ${this.doc.name} ${this.doc.version} (profile: ${this.doc.profile})`);
      const action = await this.deps.prompter.select("What do you want to do?", MENU, "exit");
      if (action === "exit") return this.doc;
      await this.step(action);
    }
  }

  async step(action: Exclude<ProjectMenuAction, "exit">): Promise<void> {
    const p = this.deps.prompter;
    switch (action) {
      case "set-name": {
        const name = await p.text("Project name", { default: this.doc.name, validate: required });
        return this.apply(setName(this.doc, name));
      }
      case "set-profile": {
        const profile = await p.text("Profile", { default: this.doc.profile, validate: required });
        return this.apply(setProfile(this.doc, profile));
      }
      case "set-version": {
        const version = await p.text("Version", { default: this.doc.version, validate: required });
        return this.apply(setVersion(this.doc, version));
      }
      case "set-require-dbt-version": {
        const value = await p.text('Required dbt version, e.g. ">=1.7.0, <2.0.0" (empty to remove)');
        return this.apply(setRequireDbtVersion(this.doc, value ? splitConstraint(value) : undefined));
      }
      case "add-path":
      case "remove-path": {
        const field = await this.pickPathField();
        if (action === "add-path") {
          const value = await p.text(`Path to add to ${field}`, { validate: required });
          return this.apply(addPath(this.doc, field, value));
        }
        const current = this.doc.paths[field];
        if (!current.length) {
          console.log(`${field} is empty.`);
          return;
        }
        const value = await p.select(`Path to remove from ${field}`, current.map((v) => ({ value: v, label: v })));
        return this.apply(removePath(this.doc, field, value));
      }
      case "add-hub-package": {
        const name = await p.text("Package (namespace/name or short name)", { validate: required });
        const version = await p.text('Version, e.g. ">=1.0.0, <2.0.0"', { validate: required });
        return this.apply(addHubPackage(this.doc, shortOrFullName(name), splitConstraint(version)));
      }
      case "add-git-package": {
        const git = await p.text("Git URL", { validate: required });
        const revision = await p.text("Revision (tag, branch or commit)", { validate: required });
        const subdirectory = await p.text("Subdirectory (optional)");
        return this.apply(addGitPackage(this.doc, git, revision, subdirectory || undefined));
      }
      case "add-local-package": {
        const local = await p.text("Local path", { validate: required });
        return this.apply(addLocalPackage(this.doc, local));
      }
      case "remove-package": {
        const identity = await this.pickPackage(false);
        if (identity) await this.apply(removePackage(this.doc, identity));
        return;
      }
      case "update-package-version": {
        const identity = await this.pickPackage(true);
        if (!identity) return;
        const version = await p.text("New version", { validate: required });
        return this.apply(updatePackageVersion(this.doc, identity, splitConstraint(version)));
      }
    }
  }

  private async apply(outcome: EditOutcome<ProjectDocument>): Promise<void> {
    switch (outcome.status) {
      case "applied":
        if (outcome.document !== this.doc) {
          await this.deps.save(outcome.document);
          this.doc = outcome.document;
        }
        console.log(`✓ ${outcome.summary}${outcome.note ? ` (${outcome.note})` : ""}`);
        return;
      case "failed":
        this.deps.logger.debug("edit failed", { code: outcome.error.code });
        console.log(`✗ ${outcome.error.message}`);
        return;
      case "confirm":
        console.log(`✗ ${outcome.message}`);
        return;
    }
  }

  private pickPathField(): Promise<PathField> {
    return this.deps.prompter.select("Path field", PATH_FIELDS.map((f) => ({ value: f, label: f })));
  }

  private async pickPackage(hubOnly: boolean): Promise<string | undefined> {
    const packages = this.doc.packages.filter((pkg) => !hubOnly || pkg.kind === "hub");
    if (!packages.length) {
      console.log(hubOnly ? "No dbt Hub packages." : "No packages.");
      return undefined;
    }
    const labels = describePackages({ ...this.doc, packages });
    return this.deps.prompter.select(
      "Package",
      packages.map((pkg, i) => ({ value: packageIdentity(pkg), label: labels[i] })),
    );
  }
}

/**
 * Choose among projects found below `root`. A single match is taken as is;
 * undefined when nothing was found.
 */
export async function pickDiscoveredProject(
  prompter: Prompter,
  root: string,
  projectFiles: readonly string[],
): Promise<string | undefined> {
  const dirs = projectFiles.map((file) => path.dirname(file));
  if (!dirs.length) {
    console.log(`No dbt projects found under ${root}`);
    return undefined;
  }
  if (dirs.length === 1) {
    console.log(`Found project: ${dirs[0]}`);
    return dirs[0];
  }
  console.log(`Found ${dirs.length} dbt projects`);
  return prompter.select(
    "Project",
    dirs.map((dir) => ({ value: dir, label: path.relative(root, dir) || "." })),
  );
}

/** Short names resolve through the known-packages table; anything else is validated as typed. */
function shortOrFullName(name: string): string {
  try {
    return resolvePackageName(name);
  } catch {
    return name; // addHubPackage reports the invalid name
  }
}

// ── project init ─────────────────────────────────────────────────────

export interface ProjectInitAnswers {
  name: string;
  profile: string;
  baseDir: string;
  team?: string;
  packages: string[];
  materialization: Materialization;
  persistDocs: boolean;
  withExample: boolean;
  runDeps: boolean;
}

export interface ProjectInitDefaults {
  name?: string;
  profile?: string;
  baseDir: string;
  /** Profile names from profiles.yml, offered as choices. */
  profiles: string[];
}

export async function askProjectInit(p: Prompter, defaults: ProjectInitDefaults): Promise<ProjectInitAnswers> {
  const name = await p.text("Project name", {
    default: defaults.name,
    validate: (v) => (PROJECT_NAME_PATTERN.test(v) ? undefined : NAME_RULE),
  });

  let profile: string;
  if (defaults.profiles.length) {
    const choice = await p.select(
      "Profile",
      [...defaults.profiles.map((n) => ({ value: n, label: n })), { value: "", label: "Enter another name" }],
      defaults.profile && defaults.profiles.includes(defaults.profile) ? defaults.profile : defaults.profiles[0],
    );
    profile = choice || (await p.text("Profile name", { default: name, validate: required }));
  } else {
    profile = await p.text("Profile name", { default: defaults.profile ?? name, validate: required });
  }

  const baseDir = await p.text("Base directory", { default: defaults.baseDir });
  const team = await p.text("Team subdirectory (optional)");

  console.log(`${DEFAULT_PACKAGE} is always included.`);
  const packages = [DEFAULT_PACKAGE];
  for (const pkg of POPULAR_PACKAGES) {
    if (pkg.name === DEFAULT_PACKAGE) continue;
    if (await p.confirm(`Add ${pkg.name} (${pkg.description})?`, false)) packages.push(pkg.name);
  }

  const materialization = await p.select<Materialization>(
    "Default materialization",
    MATERIALIZATIONS.map((m) => ({ value: m, label: m })),
    "view",
  );
  const persistDocs = await p.confirm("Persist model and column docs to the warehouse (persist_docs)?", false);
  const withExample = await p.confirm("Create an example model?", true);
  const runDeps = await p.confirm("Run 'dbt deps' afterwards?", true);

  return { name, profile, baseDir, team: team || undefined, packages, materialization, persistDocs, withExample, runDeps };
}
