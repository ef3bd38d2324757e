// packages/core/src/errors.ts
// Error taxonomy shared by every stage. `code` is stable and is what the
// HTTP layer and the `run` payload report; messages are for humans.

export type ErrorCode =
  | 'INPUT_VALIDATION'
  | 'MODEL_INVOCATION'
  | 'NO_QUERY_SPEC'
  | 'MALFORMED_QUERY_SPEC'
  | 'MISSING_COLLECTION'
  | 'FIND_EXECUTION'
  | 'AGGREGATION_EXECUTION'
  | 'STORE_INIT'
  | 'CONFIG';

export type ErrorDetails = Record<string, unknown>;

export class PipelineError extends Error {
  readonly code: ErrorCode;
  readonly details?: ErrorDetails;

  constructor(code: ErrorCode, message: string, opts: { details?: ErrorDetails; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.details = opts.details;
  }
}

export class InputValidationError extends PipelineError {
  constructor(message: string, details?: ErrorDetails) {
    super('INPUT_VALIDATION', message, { details });
  }
}

export class ModelInvocationError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('MODEL_INVOCATION', message, { cause });
  }
}

const EXCERPT_LEN = 200;

export function excerpt(text: string, max = EXCERPT_LEN): string {
  const chars = Array.from(text);
  return chars.length > max ? `${chars.slice(0, max).join('')}...` : text;
}

export class NoQuerySpecFoundError extends PipelineError {
  constructor(raw: string) {
    super('NO_QUERY_SPEC', `No JSON query specification found in model output: ${excerpt(raw)}`, {
      details: { excerpt: excerpt(raw) }
    });
  }
}

export class MalformedQuerySpecError extends PipelineError {
  constructor(reason: string, raw: string, issues?: unknown[]) {
    super('MALFORMED_QUERY_SPEC', `Malformed query specification: ${reason}`, {
      details: { excerpt: excerpt(raw), ...(issues ? { issues } : {}) }
    });
  }
}

export class MissingCollectionError extends PipelineError {
  constructor() {
    super('MISSING_COLLECTION', 'No primary_collection specified in query');
  }
}

// Known store failure shapes, surfaced next to the untouched store message.
export function storeHint(message: string): string | undefined {
  if (message.includes('$size') && /missing|array/i.test(message)) {
    return '$size needs an array; check that every referenced field exists and is an array in the schema';
  }
  if (/lookup/i.test(message)) {
    return 'lookup failed; check that the joined collections share matching field values';
  }
  return undefined;
}

export class FindExecutionError extends PipelineError {
  constructor(collection: string, cause: unknown) {
    const msg = errorMessage(cause);
    const hint = storeHint(msg);
    super('FIND_EXECUTION', `Find failed on ${collection}: ${msg}`, {
      details: { collection, ...(hint ? { hint } : {}) },
      cause
    });
  }
}

export class AggregationExecutionError extends PipelineError {
  constructor(collection: string, cause: unknown) {
    const msg = errorMessage(cause);
    const hint = storeHint(msg);
    super('AGGREGATION_EXECUTION', `Aggregation failed on ${collection}: ${msg}`, {
      details: { collection, ...(hint ? { hint } : {}) },
      cause
    });
  }
}

export class StoreInitializationError extends PipelineError {
  constructor(cause: unknown) {
    super('STORE_INIT', `Failed to initialize document store: ${errorMessage(cause)}`, { cause });
  }
}

export class ConfigError extends PipelineError {
  constructor(problems: string[]) {
    super('CONFIG', `Invalid configuration: ${problems.join('; ')}`, { details: { problems } });
  }
}

export function isPipelineError(e: unknown): e is PipelineError {
  return e instanceof PipelineError;
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
