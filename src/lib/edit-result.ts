/**
 * Outcome of an editor mutation. Editors never throw for expected failures;
 * they return `failed` with the core error, or `confirm` when a destructive
 * change needs `force`.
 */

import { CoreError, ConfirmationRequired } from "./errors.js";

export type EditOutcome<D> =
  | { status: "applied"; document: D; summary: string; note?: string }
  | { status: "confirm"; message: string }
  | { status: "failed"; error: CoreError };

export function applied<D>(document: D, summary: string, note?: string): EditOutcome<D> {
  return note === undefined ? { status: "applied", document, summary } : { status: "applied", document, summary, note };
}

export function confirm<D>(message: string): EditOutcome<D> {
  return { status: "confirm", message };
}

export function failed<D>(error: CoreError): EditOutcome<D> {
  return { status: "failed", error };
}

/**
 * Run an edit body, turning thrown core errors into a `failed` outcome.
 * Anything that is not a `CoreError` is a bug and propagates.
 */
export function attempt<D>(body: () => EditOutcome<D>): EditOutcome<D> {
  try {
    return body();
  } catch (err) {
    if (err instanceof CoreError) return failed(err);
    throw err;
  }
}

/** Unwrap an outcome for callers that want exceptions (the CLI layer). */
export function unwrap<D>(outcome: EditOutcome<D>): { document: D; summary: string; note?: string } {
  switch (outcome.status) {
    case "applied":
      return outcome;
    case "confirm":
      throw new ConfirmationRequired(outcome.message);
    case "failed":
      throw outcome.error;
  }
}
