export { QueryExecutor, toExecutionPlan, findParams } from './executor.js';
export { collectionsInvolved } from './collections.js';
export { formatResults, normalizeValue, isFormatFailure, toJsonText, type FormatOptions } from './format.js';
export {
  QueryPipeline,
  type CompileResult, type PipelineDefaults, type QueryPipelineOptions, type QueryResult, type RunErrorPayload
} from './pipeline.js';
