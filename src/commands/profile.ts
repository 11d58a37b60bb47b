/**
 * `dbtkit dbt profile` — init, show, edit profiles.yml.
 */

import { Flags, UsageError, parseFlags, type FlagSpec } from "../lib/args.js";
import type { CommandContext } from "../lib/context.js";
import { loadProfiles, readOptional, requireProfiles, saveProfiles } from "../lib/documents.js";
import { unwrap, type EditOutcome } from "../lib/edit-result.js";
import { isJsonMode, output } from "../lib/output.js";
import {
  addOutput,
  addProfile,
  deleteOutput,
  deleteProfile,
  editOutput,
  setTarget,
  type OutputChanges,
} from "../lib/profile-editor.js";
import { parseOutput, type ProfileDocument } from "../lib/profile-schema.js";
import { initProfile } from "../lib/scaffold.js";
import { resolveProfilePath } from "../lib/settings.js";
import { ProfileWizard, parseSetting } from "../tui/profile-wizard.js";

export const PROFILE_ACTIONS = [
  "add-profile",
  "delete-profile",
  "set-target",
  "add-output",
  "edit-output",
  "delete-output",
] as const;
export type ProfileAction = (typeof PROFILE_ACTIONS)[number];

function isProfileAction(value: string): value is ProfileAction {
  return PROFILE_ACTIONS.some((a) => a === value);
}

const PATH_FLAG: FlagSpec = { name: "profile-path", alias: "p", type: "string" };
const FORCE_FLAG: FlagSpec = { name: "force", alias: "f", type: "boolean" };

/** Output field flags and the key each one sets. */
const FIELD_FLAGS: ReadonlyArray<{ flag: string; key: string; numeric?: boolean }> = [
  { flag: "type", key: "type" },
  { flag: "path", key: "path" },
  { flag: "threads", key: "threads", numeric: true },
  { flag: "schema", key: "schema" },
  { flag: "database", key: "database" },
  { flag: "host", key: "host" },
  { flag: "http-path", key: "http_path" },
  { flag: "catalog", key: "catalog" },
  { flag: "auth-type", key: "auth_type" },
  { flag: "client-id", key: "client_id" },
  { flag: "client-secret", key: "client_secret" },
  { flag: "token", key: "token" },
];

const EDIT_FLAGS: FlagSpec[] = [
  PATH_FLAG,
  FORCE_FLAG,
  { name: "action", type: "string" },
  { name: "profile", type: "string" },
  { name: "output", alias: "o", type: "string" },
  { name: "target", type: "string" },
  { name: "extension", type: "list" },
  { name: "setting", type: "list" },
  { name: "unset", type: "list" },
  ...FIELD_FLAGS.map(({ flag }): FlagSpec => ({ name: flag, type: "string" })),
];

/** Output fields given on the command line, `--unset` ones as null. */
export function outputFieldsFromFlags(flags: Flags): OutputChanges {
  const fields: OutputChanges = {};
  for (const { flag, key, numeric } of FIELD_FLAGS) {
    const value = flags.string(flag);
    if (value !== undefined) fields[key] = numeric ? Number(value) : value;
  }
  const extensions = flags.list("extension");
  if (extensions.length) fields.extensions = extensions;
  const settings = flags.list("setting");
  if (settings.length) {
    const parsed: Record<string, string> = {};
    for (const pair of settings) {
      const kv = parseSetting(pair);
      if (!kv) throw new UsageError(`--setting expects key=value (got '${pair}')`);
      parsed[kv[0]] = kv[1];
    }
    fields.settings = parsed;
  }
  for (const key of flags.list("unset")) fields[key.replace(/-/g, "_")] = null;
  return fields;
}

function buildEdit(action: ProfileAction, flags: Flags, doc: ProfileDocument): EditOutcome<ProfileDocument> {
  const force = flags.boolean("force") ?? false;
  const profile = flags.require("profile", `for ${action}`);
  switch (action) {
    case "add-profile":
      return addProfile(doc, profile);
    case "delete-profile":
      return deleteProfile(doc, profile, force);
    case "set-target":
      return setTarget(doc, profile, flags.require("output", "for set-target"));
    case "add-output": {
      const name = flags.require("output", "for add-output");
      const raw = outputFieldsFromFlags(flags);
      if (raw.type === undefined) throw new UsageError("--type is required for add-output (duckdb or databricks)");
      return addOutput(doc, profile, name, parseOutput(raw, `${profile}.outputs.${name}`));
    }
    case "edit-output": {
      const changes = outputFieldsFromFlags(flags);
      if (!Object.keys(changes).length) throw new UsageError("edit-output needs at least one field flag or --unset");
      return editOutput(doc, profile, flags.require("output", "for edit-output"), changes);
    }
    case "delete-output":
      return deleteOutput(doc, profile, flags.require("output", "for delete-output"), force, flags.string("target"));
  }
}

async function editCommand(rest: string[], ctx: CommandContext): Promise<void> {
  const flags = parseFlags(rest, EDIT_FLAGS);
  const file = resolveProfilePath(flags.string("profile-path"), ctx.env).value;
  const action = flags.string("action");

  if (action === undefined) {
    if (!ctx.openPrompter) throw new UsageError("--action is required when not running in a terminal");
    const loaded = await loadProfiles(file);
    const prompter = ctx.openPrompter();
    try {
      console.log(`Editing ${file}${loaded.exists ? "" : " (new file)"}`);
      await new ProfileWizard(loaded.document, {
        prompter,
        logger: ctx.logger,
        save: (doc) => saveProfiles(file, doc),
      }).run();
    } finally {
      prompter.close();
    }
    return;
  }

  if (!isProfileAction(action)) {
    throw new UsageError(`Unknown action: ${action}\nValid actions: ${PROFILE_ACTIONS.join(", ")}`);
  }

  // add-profile may start a new file; everything else needs an existing one.
  const loaded = action === "add-profile" ? await loadProfiles(file) : await requireProfiles(file);
  const result = unwrap(buildEdit(action, flags, loaded.document));
  await saveProfiles(file, result.document);
  ctx.logger.info(`profile edit ${action}`, { path: file });

  if (isJsonMode()) {
    output({ action, path: file, summary: result.summary });
  } else {
    console.log(`✓ ${result.summary}`);
  }
}

export async function profileCommand(sub: string | undefined, rest: string[], ctx: CommandContext): Promise<void> {
  switch (sub) {
    case "init": {
      const flags = parseFlags(rest, [PATH_FLAG, FORCE_FLAG]);
      const file = resolveProfilePath(flags.string("profile-path"), ctx.env).value;
      const result = await initProfile(file, flags.boolean("force") ?? false);
      if (isJsonMode()) {
        output({ created: true, ...result });
      } else {
        console.log(`✓ ${result.overwritten ? "Overwrote" : "Created"} profile file at ${result.path}`);
      }
      return;
    }

    case "show": {
      const flags = parseFlags(rest, [PATH_FLAG]);
      const file = resolveProfilePath(flags.string("profile-path"), ctx.env).value;
      if (isJsonMode()) {
        const loaded = await loadProfiles(file);
        output({ path: file, exists: loaded.exists, profiles: loaded.document });
        return;
      }
      const text = await readOptional(file);
      console.log(`Profile path: ${file}`);
      console.log(`Exists: ${text !== undefined}`);
      if (text !== undefined) {
        console.log("\nContents:");
        console.log(text);
      }
      return;
    }

    case "edit":
      return editCommand(rest, ctx);

    case "help":
    case "--help":
    case "-h":
    case undefined:
      printProfileHelp();
      return;

    default:
      throw new UsageError(`Unknown profile command: ${sub}\nRun 'dbtkit dbt profile --help' for usage.`);
  }
}

function printProfileHelp(): void {
  console.log(`Usage: dbtkit dbt profile <command> [options]

Commands:
  init [-p PATH] [--force]      Create a starter profiles.yml (DuckDB dev output)
  show [-p PATH]                Print the profile file location and contents
  edit [-p PATH]                Interactive editor (in a terminal)
  edit --action ACTION ...      Scripted edit

Actions:
  add-profile     --profile NAME
  delete-profile  --profile NAME [--force]
  set-target      --profile NAME --output NAME
  add-output      --profile NAME --output NAME --type duckdb|databricks [fields]
  edit-output     --profile NAME --output NAME [fields] [--unset FIELD]...
  delete-output   --profile NAME --output NAME [--force] [--target NEW]

Fields:
  duckdb:      --path P --threads N --schema S --database D
               --extension E... --setting KEY=VALUE...
  databricks:  --host H --http-path P --catalog C --schema S
               --auth-type oauth-u2m|oauth-m2m|token
               --client-id ID --client-secret SECRET --token TOKEN --threads N

The profile path defaults to ~/.dbt/profiles.yml (env: DBTKIT_PROFILE_PATH).`);
}
