/**
 * xcsync - Xcode project source registration
 *
 * Main library entry point for programmatic usage
 */

// Types
export * from './types/index.js';

// Parsers
export * from './parsers/index.js';

// Core
export * from './core/errors.js';
export { collectIdentifiers, createIdGenerator, createSequentialIdGenerator } from './core/identifiers.js';
export { SOURCE_FILE_TYPES, DEFAULT_SOURCE_EXTENSIONS, sourceFileType } from './core/file-types.js';
export { planMutations, resolveSourcesPhase, resolveMainGroup } from './core/planner.js';
export type { PlanOptions } from './core/planner.js';
export { applyPlan, cloneModel } from './core/applier.js';
export { writeDescriptor } from './core/descriptor-writer.js';
export { verifyDescriptor } from './core/verify.js';
export { discoverSourceFiles, parseIgnoreFile, loadIgnoreFile } from './core/discovery.js';
export { loadConfig, parseConfig, resolveSettings } from './core/config.js';
export type { Settings, XcsyncConfig } from './core/config.js';
export { readDescriptorFile, writeDescriptorAtomic } from './core/storage.js';
export { syncSources, verifyProject } from './core/sync.js';

// Devices
export * from './devices/index.js';

// Formatters
export { formatSync, formatVerify, formatSyncText, formatVerifyText, formatJSON } from './formatters/index.js';
