/**
 * profiles.yml model — connection profiles and their adapter outputs.
 *
 * Example:
 *   analytics:
 *     target: dev
 *     outputs:
 *       dev:
 *         type: duckdb
 *         path: ./dev.duckdb
 *         threads: 4
 *
 * Outputs are a closed union on `type`; an unknown adapter is rejected
 * rather than dropped.
 */

import { z } from "zod";
import { ValidationError } from "./errors.js";
import { isMapping, toValidationError } from "./schema-issues.js";

/** dbt-duckdb's in-memory database path. */
export const IN_MEMORY_PATH = ":memory:";
export const DEFAULT_THREADS = 4;

export const ADAPTER_TYPES = ["duckdb", "databricks"] as const;
export type AdapterType = (typeof ADAPTER_TYPES)[number];

export const AUTH_TYPES = ["oauth-u2m", "oauth-m2m", "token"] as const;
export type DatabricksAuthType = (typeof AUTH_TYPES)[number];

const requiredString = z.string().min(1, "must not be empty");
const threads = z.number().int("must be an integer").positive("must be a positive integer");
const settingValue = z.union([z.string(), z.number(), z.boolean()]).transform(String);

export const DuckDbOutputSchema = z
  .object({
    type: z.literal("duckdb"),
    path: requiredString,
    threads: threads.default(DEFAULT_THREADS),
    schema: z.string().optional(),
    database: z.string().optional(),
    extensions: z.array(z.string()).optional(),
    settings: z.record(settingValue).optional(),
  })
  .strict();

export const DatabricksOutputSchema = z
  .object({
    type: z.literal("databricks"),
    host: requiredString,
    http_path: requiredString,
    catalog: requiredString,
    schema: requiredString,
    auth_type: z.enum(AUTH_TYPES),
    client_id: z.string().optional(),
    client_secret: z.string().optional(),
    token: z.string().optional(),
    threads: threads.optional(),
  })
  .strict();

type DatabricksFields = z.infer<typeof DatabricksOutputSchema>;

const CREDENTIALS: Record<DatabricksAuthType, { required: ReadonlyArray<keyof DatabricksFields>; forbidden: ReadonlyArray<keyof DatabricksFields> }> = {
  "oauth-u2m": { required: [], forbidden: ["client_id", "client_secret", "token"] },
  "oauth-m2m": { required: ["client_id", "client_secret"], forbidden: ["token"] },
  token: { required: ["token"], forbidden: ["client_id", "client_secret"] },
};

export const OutputSchema = z
  .discriminatedUnion("type", [DuckDbOutputSchema, DatabricksOutputSchema])
  .superRefine((output, ctx) => {
    if (output.type !== "databricks") return;
    const rules = CREDENTIALS[output.auth_type];
    for (const key of rules.required) {
      if (!output[key]) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: `is required when auth_type is ${output.auth_type}` });
      }
    }
    for (const key of rules.forbidden) {
      if (output[key] !== undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: `is not allowed when auth_type is ${output.auth_type}` });
      }
    }
  });

export type DuckDbOutput = z.infer<typeof DuckDbOutputSchema>;
export type DatabricksOutput = z.infer<typeof DatabricksOutputSchema>;
export type Output = DuckDbOutput | DatabricksOutput;

/** What callers hand in before defaults are applied (e.g. `threads` may be omitted). */
export type OutputInput = z.input<typeof DuckDbOutputSchema> | z.input<typeof DatabricksOutputSchema>;

export const ProfileSchema = z
  .object({
    target: requiredString.optional(),
    outputs: z.record(OutputSchema),
  })
  .strict();

export type Profile = z.infer<typeof ProfileSchema>;

/** Profile name → profile, in file order. */
export type ProfileDocument = Record<string, Profile>;

const ProfileDocumentSchema = z.record(requiredString, ProfileSchema);

/**
 * Validate one output. `field` prefixes the reported field path,
 * e.g. `analytics.outputs.dev`.
 */
export function parseOutput(raw: unknown, field = "output"): Output {
  const result = OutputSchema.safeParse(raw);
  if (!result.success) throw toValidationError(result.error, field.split("."));
  return result.data;
}

/** Validate a whole parsed profiles.yml tree. An empty file is an empty document. */
export function parseProfileDocument(raw: unknown): ProfileDocument {
  if (raw === null || raw === undefined) return {};
  if (!isMapping(raw)) throw new ValidationError("", "profiles document must be a mapping of profile names");
  const result = ProfileDocumentSchema.safeParse(raw);
  if (!result.success) throw toValidationError(result.error);
  return result.data;
}

/**
 * A profile with outputs needs a target naming one of them. A fresh profile
 * (no outputs, no target) is allowed. Edits may pass through states that
 * break this; writes may not.
 */
export function checkProfileInvariants(doc: ProfileDocument): void {
  for (const [name, profile] of Object.entries(doc)) {
    const outputs = Object.keys(profile.outputs);
    if (profile.target === undefined) {
      if (outputs.length) throw new ValidationError(`${name}.target`, "is required when the profile has outputs");
      continue;
    }
    if (!Object.hasOwn(profile.outputs, profile.target)) {
      const choices = outputs.length ? `one of the outputs (${outputs.join(", ")})` : "an existing output";
      throw new ValidationError(`${name}.target`, `must name ${choices}`);
    }
  }
}

export function isInMemoryPath(path: string): boolean {
  return path === IN_MEMORY_PATH || path === "memory";
}
