/**
 * Interactive profile editor — `dbtkit dbt profile edit` without --action.
 *
 * Menu loop over the same editor functions the flag-driven command uses.
 * Every applied change is saved straight away.
 */

import type { EditOutcome } from "../lib/edit-result.js";
import type { Logger } from "../lib/logger.js";
import {
  addOutput,
  addProfile,
  deleteOutput,
  deleteProfile,
  editOutput,
  setTarget,
  type OutputChanges,
} from "../lib/profile-editor.js";
import { AUTH_TYPES, DEFAULT_THREADS, IN_MEMORY_PATH, type DatabricksAuthType, type Output, type OutputInput, type ProfileDocument } from "../lib/profile-schema.js";
import type { Choice, Prompter } from "../lib/prompts.js";

export type ProfileMenuAction =
  | "add-profile"
  | "set-target"
  | "delete-profile"
  | "add-output"
  | "edit-output"
  | "delete-output"
  | "exit";

const MENU: Choice<ProfileMenuAction>[] = [
  { value: "add-profile", label: "Add profile" },
  { value: "set-target", label: "Change a profile's target" },
  { value: "delete-profile", label: "Delete profile" },
  { value: "add-output", label: "Add output" },
  { value: "edit-output", label: "Edit output" },
  { value: "delete-output", label: "Delete output" },
  { value: "exit", label: "Exit" },
];

export interface ProfileWizardDeps {
  prompter: Prompter;
  logger: Logger;
  save(doc: ProfileDocument): Promise<void>;
}

export function parseList(input: string): string[] {
  return input.split(",").map((s) => s.trim()).filter(Boolean);
}

/** `key=value`, or undefined when there is no key. */
export function parseSetting(input: string): [string, string] | undefined {
  const eq = input.indexOf("=");
  if (eq === -1) return undefined;
  const key = input.slice(0, eq).trim();
  return key ? [key, input.slice(eq + 1).trim()] : undefined;
}

function positiveInt(value: string): string | undefined {
  return /^[1-9]\d*$/.test(value) ? undefined : "must be a positive integer";
}

function required(value: string): string | undefined {
  return value ? undefined : "a value is required";
}

async function promptSettings(prompter: Prompter): Promise<Record<string, string>> {
  const settings: Record<string, string> = {};
  console.log("Enter settings as key=value (empty to finish):");
  for (;;) {
    const line = await prompter.text("Setting");
    if (!line) return settings;
    const parsed = parseSetting(line);
    if (!parsed) {
      console.log("  ✗ use key=value");
      continue;
    }
    settings[parsed[0]] = parsed[1];
  }
}

async function promptDuckDb(prompter: Prompter): Promise<OutputInput> {
  const path = await prompter.text(`Database path (${IN_MEMORY_PATH} for in-memory)`, { default: IN_MEMORY_PATH });
  const threads = Number(await prompter.text("Threads", { default: String(DEFAULT_THREADS), validate: positiveInt }));
  const schema = await prompter.text("Schema (optional)");
  const extensions = parseList(await prompter.text("Extensions, comma separated (optional)"));
  const settings = (await prompter.confirm("Add DuckDB settings?", false)) ? await promptSettings(prompter) : {};

  const output: OutputInput = { type: "duckdb", path, threads };
  if (schema) output.schema = schema;
  if (extensions.length) output.extensions = extensions;
  if (Object.keys(settings).length) output.settings = settings;
  return output;
}

async function promptDatabricks(prompter: Prompter): Promise<OutputInput> {
  const host = await prompter.text("Workspace host (e.g. adb-123.4.azuredatabricks.net)", { validate: required });
  const http_path = await prompter.text("SQL warehouse HTTP path", { validate: required });
  const catalog = await prompter.text("Catalog", { default: "main" });
  const schema = await prompter.text("Schema", { validate: required });
  const auth_type = await prompter.select<DatabricksAuthType>(
    "Authentication",
    AUTH_TYPES.map((value) => ({ value, label: value })),
    "oauth-u2m",
  );

  const output: OutputInput = { type: "databricks", host, http_path, catalog, schema, auth_type };
  if (auth_type === "token") output.token = await prompter.password("Personal access token");
  if (auth_type === "oauth-m2m") {
    output.client_id = await prompter.text("Client ID", { validate: required });
    output.client_secret = await prompter.password("Client secret");
  }
  return output;
}

export async function promptOutput(prompter: Prompter): Promise<OutputInput> {
  const type = await prompter.select<Output["type"]>("Adapter type", [
    { value: "duckdb", label: "DuckDB (local file or in-memory)" },
    { value: "databricks", label: "Databricks" },
  ]);
  return type === "duckdb" ? promptDuckDb(prompter) : promptDatabricks(prompter);
}

/** Fields offered for editing, per adapter. */
export function editableFields(output: Output): string[] {
  switch (output.type) {
    case "duckdb":
      return ["path", "threads", "schema", "database", "extensions", "settings"];
    case "databricks": {
      const creds = output.auth_type === "token" ? ["token"] : output.auth_type === "oauth-m2m" ? ["client_id", "client_secret"] : [];
      return ["host", "http_path", "catalog", "schema", ...creds, "threads"];
    }
  }
}

/** Convert typed-in text to the field's value; empty clears optional fields. */
export function fieldChange(field: string, input: string): OutputChanges {
  if (!input) return { [field]: null };
  switch (field) {
    case "threads":
      return { threads: Number(input) };
    case "extensions":
      return { extensions: parseList(input) };
    case "settings": {
      const settings: Record<string, string> = {};
      for (const pair of parseList(input)) {
        const parsed = parseSetting(pair);
        if (parsed) settings[parsed[0]] = parsed[1];
      }
      return { settings };
    }
    default:
      return { [field]: input };
  }
}

export class ProfileWizard {
  private doc: ProfileDocument;

  constructor(
    doc: ProfileDocument,
    private deps: ProfileWizardDeps,
  ) {
    this.doc = doc;
  }

  get document(): ProfileDocument {
    return this.doc;
  }

  async run(): Promise<ProfileDocument> {
    for (;;) {
      const action = await this.deps.prompter.select("What do you want to do?", MENU, "exit");
      if (action === "exit") return this.doc;
      await this.step(action);
    }
  }

  async step(action: Exclude<ProfileMenuAction, "exit">): Promise<void> {
    switch (action) {
      case "add-profile": {
        const name = await this.deps.prompter.text("Profile name", { validate: required });
        return this.apply(() => addProfile(this.doc, name));
      }
      case "delete-profile": {
        const name = await this.pickProfile();
        if (name) await this.apply((force) => deleteProfile(this.doc, name, force));
        return;
      }
      case "set-target": {
        const name = await this.pickProfile();
        const output = name && (await this.pickOutput(name, "New target"));
        if (name && output) await this.apply(() => setTarget(this.doc, name, output));
        return;
      }
      case "add-output": {
        const name = await this.pickProfile();
        if (!name) return;
        const outputName = await this.deps.prompter.text("Output name", { default: "dev" });
        const output = await promptOutput(this.deps.prompter);
        return this.apply(() => addOutput(this.doc, name, outputName, output));
      }
      case "edit-output": {
        const name = await this.pickProfile();
        const outputName = name && (await this.pickOutput(name, "Output to edit"));
        if (!name || !outputName) return;
        const current = this.doc[name].outputs[outputName];
        const field = await this.deps.prompter.select(
          "Field",
          editableFields(current).map((f) => ({ value: f, label: f })),
        );
        const input = field === "client_secret" || field === "token"
          ? await this.deps.prompter.password(field)
          : await this.deps.prompter.text(`${field} (empty to clear)`);
        return this.apply(() => editOutput(this.doc, name, outputName, fieldChange(field, input)));
      }
      case "delete-output": {
        const name = await this.pickProfile();
        const outputName = name && (await this.pickOutput(name, "Output to delete"));
        if (!name || !outputName) return;
        const profile = this.doc[name];
        const others = Object.keys(profile.outputs).filter((o) => o !== outputName);
        let newTarget: string | undefined;
        if (profile.target === outputName && others.length) {
          newTarget = await this.deps.prompter.select(
            "This output is the target. Pick the new target",
            others.map((o) => ({ value: o, label: o })),
          );
        }
        return this.apply((force) => deleteOutput(this.doc, name, outputName, force, newTarget));
      }
    }
  }

  /** Run an edit, ask once on `confirm`, save on success. */
  private async apply(edit: (force: boolean) => EditOutcome<ProfileDocument>): Promise<void> {
    let outcome = edit(false);
    if (outcome.status === "confirm") {
      if (!(await this.deps.prompter.confirm(outcome.message, false))) {
        console.log("Cancelled.");
        return;
      }
      outcome = edit(true);
    }
    switch (outcome.status) {
      case "applied":
        await this.deps.save(outcome.document);
        this.doc = outcome.document;
        console.log(`✓ ${outcome.summary}`);
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

  private async pickProfile(): Promise<string | undefined> {
    const names = Object.keys(this.doc);
    if (!names.length) {
      console.log("No profiles yet. Add one first.");
      return undefined;
    }
    return this.deps.prompter.select("Profile", names.map((n) => ({ value: n, label: n })));
  }

  private async pickOutput(profile: string, message: string): Promise<string | undefined> {
    const names = Object.keys(this.doc[profile].outputs);
    if (!names.length) {
      console.log(`Profile '${profile}' has no outputs.`);
      return undefined;
    }
    return this.deps.prompter.select(message, names.map((n) => ({ value: n, label: n })));
  }
}
