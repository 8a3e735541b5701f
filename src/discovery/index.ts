/**
 * Discovery: module loading, perf function lookup, metadata
 */

export {
  MODULE_EXTENSIONS,
  type ModuleNamespace,
  resolveModulePath,
  resolveModuleFile,
  importModuleFile,
  loadModule,
} from './module-loader.js';
export { PERF_NAME_PATTERN, isPerfName, modulePathFromName, funcsFromName } from './function-discoverer.js';
export { type PerfDescriptor, perf, describePerf } from './metadata.js';
