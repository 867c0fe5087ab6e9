export { createProgram } from './program.js';
export { runGenerate, toOverrides } from './commands/generate.js';
export type { GenerateOptions } from './commands/generate.js';
export { formatGenerateSummary, formatPluginList, formatBytes } from './output/formatter.js';
