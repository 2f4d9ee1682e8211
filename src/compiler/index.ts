/**
 * Compiler module exports
 */
export { ZoneCompiler, compileZone, resolveCompileOptions } from './ZoneCompiler.js';
export { ingestRecord, type IngestResult, type IngestContext, type SkipReason } from './ingest.js';
export { groupRecords, type GroupResult, type TtlConflict } from './group.js';
export { formatRdata, parseTxtSegments, quoteCharacterString } from './rdata.js';
export { hclString, sanitizeName, LabelAllocator } from './hcl.js';
export { ownerName, qualifyTarget, relativeName } from './names.js';
export { renderRecordSet, renderPreamble, type RenderContext } from './render.js';
