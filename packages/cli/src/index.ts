/**
 * @nbimport/cli
 *
 * The commander program and the plain-text formatters it prints with.
 */

export { program } from './commands/index.js';
export { bindingsToJson, cellRows, describeValue, formatBindings, previewSource } from './output/format.js';
export type { CellRow } from './output/format.js';
