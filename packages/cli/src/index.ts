export { createProgram } from './program.js';
export { processIO, type CliContext, type CliIO, type GlobalOptions } from './context.js';
export { renderDetectTable, renderStats, renderTrendTable } from './render/report.js';
export { renderSkipList, SKIP_LIST_FORMATS, type QuarantineEntry, type SkipListFormat } from './render/skip-list.js';
