export { Command, type CommandOptions } from './command.js';
export { RunnerCache } from './runner-cache.js';
export { SPEC_FIELDS, isSpecField, pickParams, construct } from './params.js';
export { isRunnerConstructor, loadRunnerConstructor } from './runner-module.js';
