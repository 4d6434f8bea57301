export * from './runner.js';
export * from './xcode.js';
