/**
 * Pure mutations over a ProfileDocument.
 *
 * Every function copies what it changes and leaves its input untouched,
 * so the same call on the same document always yields an equal result.
 */

import { DuplicateNameError, NotFoundError, ValidationError } from "./errors.js";
import { applied, attempt, confirm, failed, type EditOutcome } from "./edit-result.js";
import { parseOutput, type Output, type OutputInput, type Profile, type ProfileDocument } from "./profile-schema.js";

export type ProfileOutcome = EditOutcome<ProfileDocument>;

/** Field changes for `editOutput`. `null` removes an optional field. */
export type OutputChanges = Record<string, unknown>;

function requireName(field: string, name: string): void {
  if (!name.trim()) throw new ValidationError(field, "must not be empty");
}

function withProfile(doc: ProfileDocument, name: string, profile: Profile): ProfileDocument {
  return { ...doc, [name]: profile };
}

function lookup(doc: ProfileDocument, name: string): Profile {
  if (!Object.hasOwn(doc, name)) throw new NotFoundError("profile", name);
  return doc[name];
}

function lookupOutput(profile: Profile, profileName: string, outputName: string): Output {
  if (!Object.hasOwn(profile.outputs, outputName)) {
    throw new NotFoundError("output", outputName, `Output '${outputName}' not found in profile '${profileName}'`);
  }
  return profile.outputs[outputName];
}

function withoutKey<T>(record: Record<string, T>, key: string): Record<string, T> {
  const out: Record<string, T> = {};
  for (const [k, v] of Object.entries(record)) {
    if (k !== key) out[k] = v;
  }
  return out;
}

export function addProfile(doc: ProfileDocument, name: string): ProfileOutcome {
  return attempt(() => {
    requireName("profile", name);
    if (Object.hasOwn(doc, name)) return failed(new DuplicateNameError("profile", name));
    return applied(withProfile(doc, name, { outputs: {} }), `Added profile '${name}'`);
  });
}

export function deleteProfile(doc: ProfileDocument, name: string, force = false): ProfileOutcome {
  return attempt(() => {
    const profile = lookup(doc, name);
    const count = Object.keys(profile.outputs).length;
    if (count > 0 && !force) {
      return confirm(`Profile '${name}' has ${count} output(s). Delete it anyway?`);
    }
    return applied(withoutKey(doc, name), `Deleted profile '${name}'`);
  });
}

/** A profile without a target adopts the first output added to it. */
export function addOutput(
  doc: ProfileDocument,
  profileName: string,
  outputName: string,
  output: OutputInput,
): ProfileOutcome {
  return attempt(() => {
    const profile = lookup(doc, profileName);
    requireName("output", outputName);
    if (Object.hasOwn(profile.outputs, outputName)) {
      return failed(
        new DuplicateNameError("output", outputName, `Output '${outputName}' already exists in profile '${profileName}'`),
      );
    }
    const parsed = parseOutput(output, `${profileName}.outputs.${outputName}`);
    const next: Profile = {
      ...profile,
      outputs: { ...profile.outputs, [outputName]: parsed },
    };
    let summary = `Added ${parsed.type} output '${outputName}' to profile '${profileName}'`;
    if (next.target === undefined) {
      next.target = outputName;
      summary += ` (now the target)`;
    }
    return applied(withProfile(doc, profileName, next), summary);
  });
}

/**
 * Merge `changes` into an existing output and re-validate. Changing `type`
 * replaces the output outright, so the new variant's required fields must all
 * be in `changes`.
 */
export function editOutput(
  doc: ProfileDocument,
  profileName: string,
  outputName: string,
  changes: OutputChanges,
): ProfileOutcome {
  return attempt(() => {
    const profile = lookup(doc, profileName);
    const current = lookupOutput(profile, profileName, outputName);

    const replacing = changes.type !== undefined && changes.type !== current.type;
    const merged: Record<string, unknown> = replacing ? {} : { ...current };
    for (const [key, value] of Object.entries(changes)) {
      if (value === null) delete merged[key];
      else if (value !== undefined) merged[key] = value;
    }

    const parsed = parseOutput(merged, `${profileName}.outputs.${outputName}`);
    const next: Profile = { ...profile, outputs: { ...profile.outputs, [outputName]: parsed } };
    const fields = Object.keys(changes).filter((key) => changes[key] !== undefined);
    const summary = replacing
      ? `Replaced output '${outputName}' in profile '${profileName}' with a ${parsed.type} output`
      : `Updated ${fields.join(", ") || "nothing"} on output '${outputName}' in profile '${profileName}'`;
    return applied(withProfile(doc, profileName, next), summary);
  });
}

/**
 * Deleting the target output needs `force`. The target then moves to
 * `newTarget` when given, otherwise it is cleared and must be set before
 * the document can be saved.
 */
export function deleteOutput(
  doc: ProfileDocument,
  profileName: string,
  outputName: string,
  force = false,
  newTarget?: string,
): ProfileOutcome {
  return attempt(() => {
    const profile = lookup(doc, profileName);
    lookupOutput(profile, profileName, outputName);

    const isTarget = profile.target === outputName;
    if (isTarget && !force) {
      return confirm(`Output '${outputName}' is the target of profile '${profileName}'. Delete it anyway?`);
    }

    const outputs = withoutKey(profile.outputs, outputName);
    const next: Profile = { outputs };
    let summary = `Deleted output '${outputName}' from profile '${profileName}'`;

    if (!isTarget) {
      if (profile.target !== undefined) next.target = profile.target;
    } else if (newTarget !== undefined) {
      if (!Object.hasOwn(outputs, newTarget)) {
        throw new NotFoundError("output", newTarget, `Output '${newTarget}' not found in profile '${profileName}'`);
      }
      next.target = newTarget;
      summary += `; target is now '${newTarget}'`;
    } else {
      summary += "; target cleared";
    }
    return applied(withProfile(doc, profileName, next), summary);
  });
}

export function setTarget(doc: ProfileDocument, profileName: string, outputName: string): ProfileOutcome {
  return attempt(() => {
    const profile = lookup(doc, profileName);
    lookupOutput(profile, profileName, outputName);
    return applied(
      withProfile(doc, profileName, { ...profile, target: outputName }),
      `Set target of profile '${profileName}' to '${outputName}'`,
    );
  });
}
