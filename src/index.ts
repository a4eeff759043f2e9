/**
 * Specify: Spec-Driven Development project scaffolder.
 *
 * Writes an assistant's slash-command files, the `.specify/` templates and
 * the helper scripts for one script type into a new or existing directory.
 */

export * from './errors/index.js';
export * from './config/assistants.js';
export * from './config/script-types.js';
export * from './config/constants.js';
export * from './config/defaults.js';
export * from './schemas/project-config.js';
export * from './assets/store.js';
export * from './templates/substitution.js';
export * from './templates/frontmatter.js';
export * from './templates/toml.js';
export * from './templates/materializer.js';
export * from './scripts/materializer.js';
export * from './project/layout.js';
export * from './project/writer.js';
export * from './init/tracker.js';
export * from './init/selection.js';
export * from './init/tools.js';
export * from './init/vcs.js';
export * from './init/orchestrator.js';
export { runInit, type InitRuntime } from './cli/init.js';
