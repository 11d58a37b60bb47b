/**
 * Programmatic API — re-exports the core modules.
 *
 * The CLI (cli.ts) is a thin layer over these; everything here works on
 * in-memory documents or explicit file paths and never prompts or exits.
 */

export * from "./lib/errors.js";
export * from "./lib/edit-result.js";
export * from "./lib/profile-schema.js";
export * from "./lib/project-schema.js";
export * from "./lib/profile-editor.js";
export * from "./lib/project-editor.js";
export { parseYaml, decodeProfiles, encodeProfiles, decodeProject, encodeProject, encodePackages } from "./lib/yaml-codec.js";
export { loadProfiles, requireProfiles, saveProfiles, loadProject, saveProject, PROJECT_FILE, PACKAGES_FILE } from "./lib/documents.js";
export { writeFileAtomic, writeFilesAtomic } from "./lib/atomic-write.js";
export { findProjectFile, findDbtProjects } from "./lib/finder.js";
export { resolveSetting, resolveProfilePath, resolveProjectDir, type Resolved, type SettingSource } from "./lib/settings.js";
export { initProfile, initProject, type ProjectInitOptions } from "./lib/scaffold.js";
export { DbtRunner } from "./lib/dbt.js";
export { Logger, silentLogger } from "./lib/logger.js";
