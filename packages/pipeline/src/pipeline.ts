// packages/pipeline/src/pipeline.ts
// request -> prompt -> model -> spec -> store -> formatted response
import { z } from 'zod';
import {
  DEFAULT_LIMIT, InputValidationError, childLogger, describeIssues, errorMessage, isPipelineError, preview,
  type DocumentStore, type ExecutionPlan, type FormatOutcome, type GenerateOptions, type JoinStrategy,
  type Logger, type ModelClient, type QueryRequest, type QuerySpec
} from '@docquery/core';
import { SchemaContext } from '@docquery/schema';
import { QuerySynthesizer, buildPrompt, extractQuerySpec, validateQuerySpec } from '@docquery/synth';
import { QueryExecutor, toExecutionPlan } from './executor.js';
import { formatResults, isFormatFailure, toJsonText } from './format.js';

export interface PipelineDefaults {
  limit: number;
  maxLimit: number;
  includeAggregation: boolean;
  joinStrategy: JoinStrategy;
  generate: GenerateOptions;
}

const DEFAULTS: PipelineDefaults = {
  limit: DEFAULT_LIMIT,
  maxLimit: 1000,
  includeAggregation: false,
  joinStrategy: 'lookup',
  generate: {}
};

export interface QueryPipelineOptions {
  model?: ModelClient;
  store: DocumentStore;
  defaults?: Partial<PipelineDefaults>;
  logger?: Logger;
  now?: () => Date;
}

export interface CompileResult {
  prompt: string;
  spec: QuerySpec;
  plan: ExecutionPlan;
  warnings: string[];
  modelMs: number;
}

export interface QueryResult {
  response: FormatOutcome;
  spec: QuerySpec;
  warnings: string[];
  rowCount: number;
  timings: { modelMs: number; storeMs: number };
}

export interface RunErrorPayload {
  error: string;
  code: string;
  user_request: string;
  schema_length: number;
  timestamp: string;
}

const notBlank = (what: string) => z.string().refine((s) => s.trim().length > 0, `${what} must not be empty`);

const RequestSchema = z.object({
  userRequest: notBlank('user request'),
  schemaText: notBlank('schema text'),
  limit: z.number().int().positive().optional(),
  includeAggregation: z.boolean().optional(),
  joinStrategy: notBlank('join strategy').optional()
});

interface ResolvedRequest {
  userRequest: string;
  schemaText: string;
  limit: number;
  includeAggregation: boolean;
  joinStrategy: JoinStrategy;
}

export class QueryPipeline {
  private readonly synthesizer: QuerySynthesizer;
  private readonly executor: QueryExecutor;
  private readonly store: DocumentStore;
  private readonly defaults: PipelineDefaults;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(opts: QueryPipelineOptions) {
    this.log = opts.logger ?? childLogger('pipeline');
    this.defaults = { ...DEFAULTS, ...opts.defaults };
    this.now = opts.now ?? (() => new Date());
    this.store = opts.store;
    this.synthesizer = new QuerySynthesizer(opts.model, this.defaults.generate, this.log.child({ stage: 'synth' }));
    this.executor = new QueryExecutor(opts.store, this.log.child({ stage: 'executor' }));
  }

  private resolve(input: QueryRequest): ResolvedRequest {
    const parsed = RequestSchema.safeParse(input);
    if (!parsed.success) {
      const issues = describeIssues(parsed.error);
      throw new InputValidationError(
        `Invalid query request: ${issues.map((i) => (i.path ? `${i.path}: ${i.msg}` : i.msg)).join('; ')}`,
        { issues }
      );
    }
    const r = parsed.data;
    return {
      userRequest: r.userRequest,
      schemaText: r.schemaText,
      limit: Math.min(r.limit ?? this.defaults.limit, this.defaults.maxLimit),
      includeAggregation: r.includeAggregation ?? this.defaults.includeAggregation,
      joinStrategy: r.joinStrategy ?? this.defaults.joinStrategy
    };
  }

  /** Everything up to, but not including, the store. */
  async compile(input: QueryRequest): Promise<CompileResult> {
    const req = this.resolve(input);
    this.log.info(
      { request: preview(req.userRequest), requestLength: req.userRequest.length, schemaLength: req.schemaText.length },
      'query-received'
    );

    const prompt = buildPrompt(req);
    const t0 = Date.now();
    const raw = await this.synthesizer.synthesize(prompt);
    const modelMs = Date.now() - t0;

    const extracted = extractQuerySpec(raw, { defaultLimit: req.limit });
    const spec: QuerySpec = extracted.limit > this.defaults.maxLimit
      ? { ...extracted, limit: this.defaults.maxLimit }
      : extracted;

    const warnings = validateQuerySpec(spec, new SchemaContext(req.schemaText));
    for (const warning of warnings) this.log.warn({ collection: spec.primary_collection, warning }, 'spec-warning');

    this.log.info(
      { collection: spec.primary_collection, mode: spec.aggregation.length ? 'aggregate' : 'find', modelMs },
      'query-compiled'
    );
    return { prompt, spec, plan: toExecutionPlan(spec), warnings, modelMs };
  }

  async query(input: QueryRequest): Promise<QueryResult> {
    const { spec, warnings, modelMs } = await this.compile(input);

    const t0 = Date.now();
    const rows = await this.executor.execute(spec);
    const storeMs = Date.now() - t0;

    const response = formatResults(rows, spec, { now: this.now });
    if (isFormatFailure(response)) this.log.error({ err: response.error }, 'format-failed');

    return { response, spec, warnings, rowCount: rows.length, timings: { modelMs, storeMs } };
  }

  /** String-in, JSON-out entry point. Failures come back as an error payload, never as a rejection. */
  async run(
    userRequest: string,
    schemaText: string,
    limit: number = DEFAULT_LIMIT,
    includeAggregation = false,
    joinStrategy: JoinStrategy = 'lookup'
  ): Promise<string> {
    try {
      const { response } = await this.query({ userRequest, schemaText, limit, includeAggregation, joinStrategy });
      return toJsonText(response);
    } catch (e) {
      const code = isPipelineError(e) ? e.code : 'INTERNAL';
      this.log.error({ err: errorMessage(e), code }, 'query-failed');
      const payload: RunErrorPayload = {
        error: errorMessage(e),
        code,
        user_request: userRequest,
        schema_length: schemaText.length,
        timestamp: this.now().toISOString()
      };
      return JSON.stringify(payload, null, 2);
    }
  }

  async close(): Promise<void> {
    await this.store.close?.();
  }
}
