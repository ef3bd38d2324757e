// apps/http/src/app.ts
import Fastify, { type FastifyReply, type FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { z, ZodError } from 'zod';
import {
  describeIssues, errorMessage, isPipelineError,
  type DocumentStore, type ErrorCode, type Logger, type QueryRequest, type StoreHealth
} from '@docquery/core';
import { isFormatFailure, toJsonText, type QueryPipeline } from '@docquery/pipeline';
import type { SchemaContext } from '@docquery/schema';

export interface AppOptions {
  pipeline: QueryPipeline;
  store: DocumentStore;
  // Used when a request carries no schema of its own.
  schema?: SchemaContext;
  logger: Logger;
  corsOrigins?: string[];
  debugErrors?: boolean;
  rateLimit?: { max: number; timeWindow: string };
}

const QueryBody = z.object({
  user_request: z.string(),
  schema: z.string().optional(),
  limit: z.number().int().positive().optional(),
  include_aggregation: z.boolean().optional(),
  join_strategy: z.string().optional()
});
type QueryBody = z.infer<typeof QueryBody>;

const DebugQuery = z.object({ debug: z.string().optional() });

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  INPUT_VALIDATION: 400,
  NO_QUERY_SPEC: 422,
  MALFORMED_QUERY_SPEC: 422,
  MISSING_COLLECTION: 422,
  MODEL_INVOCATION: 502,
  FIND_EXECUTION: 503,
  AGGREGATION_EXECUTION: 503,
  STORE_INIT: 503,
  CONFIG: 500
};

function hasStatusCode(e: unknown): e is { statusCode: number } {
  return typeof e === 'object' && e !== null && 'statusCode' in e && typeof e.statusCode === 'number';
}

export function classifyError(e: unknown): { code: string; status: number; message: string } {
  const message = errorMessage(e);
  if (e instanceof ZodError) return { code: 'VALIDATION', status: 400, message };
  if (isPipelineError(e)) return { code: e.code, status: STATUS_BY_CODE[e.code], message };
  // framework errors (bad JSON, rate limit) already carry a client status
  if (hasStatusCode(e) && e.statusCode >= 400 && e.statusCode < 500) {
    return { code: 'REQUEST', status: e.statusCode, message };
  }
  return { code: 'INTERNAL', status: 500, message };
}

function shouldDebug(req: FastifyRequest, always: boolean): boolean {
  const q = DebugQuery.safeParse(req.query);
  const h = String(req.headers['x-debug'] ?? '');
  return (q.success && q.data.debug === '1') || h === '1' || always;
}

function toRequest(body: QueryBody, fallback?: SchemaContext): QueryRequest {
  return {
    userRequest: body.user_request,
    schemaText: body.schema ?? fallback?.text ?? '',
    limit: body.limit,
    includeAggregation: body.include_aggregation,
    joinStrategy: body.join_strategy
  };
}

export async function buildApp(opts: AppOptions) {
  const { pipeline, store, schema } = opts;
  const debugAll = opts.debugErrors ?? false;
  const allow = opts.corsOrigins ?? [];

  const app = Fastify({
    logger: opts.logger,
    bodyLimit: 1_000_000
  });

  await app.register(cors, {
    origin: (origin, cb) => {
      if (!origin || allow.length === 0 || allow.includes(origin)) return cb(null, true);
      cb(new Error('CORS not allowed'), false);
    },
    credentials: true
  });

  await app.register(rateLimit, opts.rateLimit ?? { max: 600, timeWindow: '1 minute' });

  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('x-request-id', req.id);
    return payload;
  });

  const sendError = (req: FastifyRequest, reply: FastifyReply, err: unknown) => {
    const { code, status, message } = classifyError(err);
    if (status >= 500) req.log.error({ err, requestId: req.id, code }, 'request-error');
    else req.log.warn({ requestId: req.id, code, error: message }, 'request-rejected');
    return reply.code(status).send({
      code,
      message: 'Request failed',
      error: message,
      requestId: req.id,
      ...(shouldDebug(req, debugAll) && isPipelineError(err) && err.details ? { trace: err.details } : {})
    });
  };

  app.setErrorHandler((err, req, reply) => sendError(req, reply, err));

  const parseBody = (req: FastifyRequest, reply: FastifyReply): QueryBody | undefined => {
    const parsed = QueryBody.safeParse(req.body ?? {});
    if (parsed.success) return parsed.data;
    void reply.status(400).send({ code: 'VALIDATION', details: describeIssues(parsed.error) });
    return undefined;
  };

  // ------------------------------------
  // POST /query  (request -> spec -> rows)
  // ------------------------------------
  app.post('/query', async (req, reply) => {
    const body = parseBody(req, reply);
    if (!body) return reply;

    const debug = shouldDebug(req, debugAll);
    try {
      const out = await pipeline.query(toRequest(body, schema));
      reply.header('x-store', store.name);
      if (isFormatFailure(out.response)) {
        return reply.code(500).type('application/json').send(toJsonText({ code: 'FORMAT', ...out.response }));
      }

      return reply.send({
        ...out.response,
        ...(debug
          ? { trace: { warnings: out.warnings, modelMs: out.timings.modelMs, storeMs: out.timings.storeMs, rowCount: out.rowCount } }
          : {})
      });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  // --------------------------------------------------
  // POST /compile  (request -> spec; no store call)
  // --------------------------------------------------
  app.post('/compile', async (req, reply) => {
    const body = parseBody(req, reply);
    if (!body) return reply;

    try {
      const out = await pipeline.compile(toRequest(body, schema));
      return reply.send({
        spec: out.spec,
        plan: out.plan,
        warnings: out.warnings,
        ...(shouldDebug(req, debugAll) ? { trace: { prompt: out.prompt } } : {}),
        meta: { modelMs: out.modelMs }
      });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.get('/healthz', async () => ({ ok: true }));

  app.get('/readyz', async () => {
    let health: StoreHealth;
    try {
      health = (await store.health?.()) ?? { ok: true };
    } catch (e) {
      health = { ok: false, error: errorMessage(e) };
    }
    return { ok: health.ok, store: { name: store.name, ...health } };
  });

  return app;
}
