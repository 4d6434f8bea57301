/**
 * Parsers module exports
 */
export * from './pbx-syntax.js';
export * from './pbxproj-parser.js';
export * from './descriptor-reader.js';
export * from './workspace-parser.js';
export * from './project-locator.js';
