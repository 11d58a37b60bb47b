/**
 * Maps zod issues onto `ValidationError` so callers see one field path and
 * one violated rule instead of zod's issue list.
 */

import type { ZodError, ZodIssue } from "zod";
import { ValidationError } from "./errors.js";

export function describeIssue(issue: ZodIssue): string {
  switch (issue.code) {
    case "invalid_type":
      return issue.received === "undefined"
        ? "is required"
        : `expected ${issue.expected}, got ${issue.received}`;
    case "invalid_union_discriminator":
      return `must be one of ${issue.options.map(String).join(", ")}`;
    case "invalid_enum_value":
      return `must be one of ${issue.options.map(String).join(", ")} (got '${String(issue.received)}')`;
    case "unrecognized_keys":
      return `unknown field(s): ${issue.keys.join(", ")}`;
    default:
      return issue.message;
  }
}

export function toValidationError(error: ZodError, prefix: ReadonlyArray<string | number> = []): ValidationError {
  const [issue] = error.issues;
  if (!issue) return new ValidationError(prefix.join("."), "is invalid");
  const field = [...prefix, ...issue.path].join(".");
  return new ValidationError(field, describeIssue(issue));
}

export function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
