/**
 * @nbimport/module-loader
 *
 * nbimport module loader — notebook path resolution, the finder/loader pair
 * that executes notebooks into modules, the module registry, the import
 * system that consults the finder chain, and hook installation.
 */

export { DEFAULT_NOTEBOOK_EXTENSION, candidatePaths, resolveNotebook } from './path-resolver.js';
export type { ResolveOptions } from './path-resolver.js';

export { LoaderCache } from './loader-cache.js';

export type { AmbientLease } from './ambient.js';
export { acquireAmbientNamespace, ambientDepth } from './ambient.js';

export type { LoaderDependencies } from './loader.js';
export { NotebookLoader } from './loader.js';
export { NotebookFinder } from './finder.js';

export { ModuleRegistry } from './registry.js';

export type { Finder, ImportHost, ImportSystemOptions } from './import-system.js';
export { ImportSystem } from './import-system.js';

export type { HookHandle } from './hook-registrar.js';
export { HookRegistrar } from './hook-registrar.js';

export type { NotebookImporter, NotebookImporterOptions } from './bootstrap.js';
export { createNotebookImporter } from './bootstrap.js';
