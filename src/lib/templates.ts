/**
 * Starter content for `profile init` and `project init`.
 *
 * Documents are built as typed values and go through the codec like any
 * edit would; only the example model and .gitignore are raw text.
 */

import { DEFAULT_THREADS, type ProfileDocument } from "./profile-schema.js";
import { defaultPaths, type PackageRef, type ProjectDocument } from "./project-schema.js";

export const MATERIALIZATIONS = ["view", "table", "ephemeral"] as const;
export type Materialization = (typeof MATERIALIZATIONS)[number];

export function isMaterialization(value: string): value is Materialization {
  return MATERIALIZATIONS.some((known) => known === value);
}

export const STARTER_PROFILE = "default";
export const STARTER_OUTPUT = "dev";

/** One `default` profile whose `dev` output is a local DuckDB file. */
export function starterProfiles(): ProfileDocument {
  return {
    [STARTER_PROFILE]: {
      target: STARTER_OUTPUT,
      outputs: {
        [STARTER_OUTPUT]: { type: "duckdb", path: "dev.duckdb", threads: DEFAULT_THREADS },
      },
    },
  };
}

export interface ProjectTemplateOptions {
  name: string;
  profile: string;
  packages: PackageRef[];
  materialization?: Materialization;
  persistDocs?: boolean;
}

export function starterProject(options: ProjectTemplateOptions): ProjectDocument {
  const modelConfig: Record<string, unknown> = {};
  if (options.materialization) modelConfig["+materialized"] = options.materialization;
  if (options.persistDocs) modelConfig["+persist_docs"] = { relation: true, columns: true };

  const extra: Record<string, unknown> = {
    "config-version": 2,
    "clean-targets": ["target", "dbt_packages"],
  };
  if (Object.keys(modelConfig).length) extra.models = { [options.name]: modelConfig };

  return {
    name: options.name,
    version: "1.0.0",
    profile: options.profile,
    paths: defaultPaths(),
    packages: options.packages,
    extra,
  };
}

export const GITIGNORE = `target/
dbt_packages/
logs/
`;

export const EXAMPLE_MODEL_PATH = "models/example/my_first_model.sql";
export const EXAMPLE_SCHEMA_PATH = "models/example/schema.yml";

export const EXAMPLE_MODEL = `-- Example model: replace with your own transformations.
select 1 as id, 'hello' as greeting
union all
select 2 as id, 'world' as greeting
`;

export const EXAMPLE_SCHEMA = `version: 2

models:
  - name: my_first_model
    description: "Starter model created by dbtkit"
    columns:
      - name: id
        description: "Primary key"
        data_tests:
          - unique
          - not_null
`;
