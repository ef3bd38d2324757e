// apps/http/src/index.ts
import 'dotenv/config';
import { childLogger, loadConfig, logger } from '@docquery/core';
import { OpenAIModelClient } from '@docquery/model-openai';
import { QueryPipeline } from '@docquery/pipeline';
import { loadSchemaContext } from '@docquery/schema';
import { MongoStore } from '@docquery/store-mongo';
import { buildApp } from './app.js';

async function main() {
  const config = loadConfig();
  logger.level = config.logLevel;

  // Connection is lazy: the executor initializes the store on first query.
  const store = new MongoStore(
    { uri: config.mongo.uri, db: config.mongo.db, serverSelectionTimeoutMS: config.mongo.timeoutMs },
    childLogger('store-mongo')
  );

  const model = config.model.apiKey
    ? new OpenAIModelClient({
      apiKey: config.model.apiKey,
      model: config.model.model,
      baseURL: config.model.baseURL
    })
    : undefined;
  if (!model) logger.warn({ model: config.model.model }, 'model-not-configured');

  const schema = config.schemaPath ? loadSchemaContext(config.schemaPath) : undefined;

  const pipeline = new QueryPipeline({
    model,
    store,
    defaults: {
      limit: config.limits.defaultLimit,
      maxLimit: config.limits.maxLimit,
      generate: { temperature: config.model.temperature, maxTokens: config.model.maxTokens }
    }
  });

  const app = await buildApp({
    pipeline,
    store,
    schema,
    logger,
    corsOrigins: config.http.corsOrigins,
    debugErrors: config.http.debugErrors
  });

  app.log.info(
    {
      mongo_uri: process.env.MONGO_URI ? 'env:MONGO_URI' : 'default',
      mongo_db: config.mongo.db,
      model: model?.name ?? 'none',
      schema: schema?.source ?? 'per-request'
    },
    'service-config'
  );

  const onShutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting-down');
    try {
      await Promise.allSettled([pipeline.close(), app.close()]);
    } finally {
      process.exit(0);
    }
  };
  process.once('SIGINT', () => void onShutdown('SIGINT'));
  process.once('SIGTERM', () => void onShutdown('SIGTERM'));

  await app.listen({ port: config.http.port, host: config.http.host });
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'boot-failed');
  process.exit(1);
});
