/**
 * Core error taxonomy.
 *
 * Every failure the model, codec or editors can report is a `CoreError`
 * subclass with a stable `code` and a process exit code from the 10-family.
 * Passthrough exit codes from dbt never go through these classes.
 */

export type CoreErrorCode =
  | "validation"
  | "malformed_document"
  | "not_found"
  | "duplicate_name"
  | "wrong_package_kind"
  | "confirmation_required";

export const EXIT_CODES: Record<CoreErrorCode, number> = {
  validation: 10,
  malformed_document: 11,
  not_found: 12,
  duplicate_name: 13,
  wrong_package_kind: 14,
  confirmation_required: 15,
};

/** Exit code for bad command-line usage (missing flag, unknown action). */
export const USAGE_EXIT_CODE = 2;

/** Base for all core errors. Preserves prototype chain for instanceof. */
export abstract class CoreError extends Error {
  abstract readonly code: CoreErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  toJSON(): { error: CoreErrorCode; message: string } {
    return { error: this.code, message: this.message };
  }
}

/** A field is missing, has the wrong type, or breaks a format rule. */
export class ValidationError extends CoreError {
  readonly code = "validation";

  constructor(
    public readonly field: string,
    public readonly rule: string,
  ) {
    super(field ? `${field}: ${rule}` : rule);
  }
}

/** The text is not parseable YAML. */
export class MalformedDocumentError extends CoreError {
  readonly code = "malformed_document";

  constructor(
    reason: string,
    public readonly line?: number,
    public readonly column?: number,
  ) {
    super(line !== undefined ? `Invalid YAML at line ${line}, column ${column ?? 0}: ${reason}` : `Invalid YAML: ${reason}`);
  }
}

export type EntityKind = "profile" | "output" | "package" | "project" | "file";

/** A referenced profile, output, package, project or file does not exist. */
export class NotFoundError extends CoreError {
  readonly code = "not_found";

  constructor(
    public readonly kind: EntityKind,
    public readonly entity: string,
    message?: string,
  ) {
    super(message ?? `${capitalize(kind)} '${entity}' not found`);
  }
}

/** Attempted to create something that already exists. */
export class DuplicateNameError extends CoreError {
  readonly code = "duplicate_name";

  constructor(
    public readonly kind: EntityKind,
    public readonly entity: string,
    message?: string,
  ) {
    super(message ?? `${capitalize(kind)} '${entity}' already exists`);
  }
}

/** An operation only valid for hub packages was applied to a git or local one. */
export class WrongPackageKindError extends CoreError {
  readonly code = "wrong_package_kind";

  constructor(
    public readonly identity: string,
    public readonly actualKind: string,
  ) {
    super(`Package '${identity}' is a ${actualKind} package, only hub packages have a version`);
  }
}

/** A destructive operation needs an explicit force flag. Not a failure of the input. */
export class ConfirmationRequired extends CoreError {
  readonly code = "confirmation_required";
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}
