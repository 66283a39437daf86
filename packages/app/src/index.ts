export { bootstrap, defaultDescriptors, RESULT_CACHE_CATEGORY } from './bootstrap.js';
export type { BootstrapOptions, ResultCacheName, ToolgateApp } from './bootstrap.js';

export { parseCommand, runCommand, formatCatalog, formatHealth } from './console.js';
export type { ConsoleCommand } from './console.js';
