// src/app.ts
// Builds the Fastify application. server.ts only adds listen() and shutdown,
// so tests can drive the same app through inject().

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { config } from './config';
import type { DbAdapter } from './db/types';
import { TypeClassifier } from './extraction/classifier';
import { createModelInference } from './extraction/inference';
import { createExtractionService } from './extraction/service';
import type { SemanticInference } from './extraction/types';
import { ConversationMachine } from './conversation/machine';
import { ConversationService } from './conversation/service';
import type { AssemblyPolicy } from './assembly/assembler';
import { createAssemblyService } from './assembly/service';
import { createValidators } from './validators';
import { createDocumentStore } from './store/documents';
import { createConversationStore } from './store/sessions';
import { KeyedLock } from './utils/keyedLock';
import { registerObservability, requestIdGenerator } from './observability';
import { registerRateLimit } from './middleware/rateLimit';
import { registerErrorHandler } from './middleware/errorHandler';
import { createDocumentRoutes } from './routes/documents';
import { createSessionRoutes } from './routes/sessions';
import { createHealthRoutes } from './routes/health';
import { createMetricsRoutes } from './routes/metrics';

export interface AppOptions {
  db: DbAdapter;
  /** Fastify's own logger; request logs go through pino hooks regardless */
  logger?: boolean;
  /** Overrides INFERENCE_ENABLED; null disables inference */
  inference?: SemanticInference | null;
  assemblyPolicy?: AssemblyPolicy;
  now?: () => Date;
  generateSessionId?: () => string;
}

export async function buildApp(opts: AppOptions): Promise<FastifyInstance> {
  const { db } = opts;

  const app = Fastify({
    logger: opts.logger ?? false,
    genReqId: requestIdGenerator,
  });

  registerObservability(app);
  await app.register(cors, { origin: config.cors.origins });
  await registerRateLimit(app);
  registerErrorHandler(app);

  // Stores
  const documents = createDocumentStore(db);
  const sessions = createConversationStore(db);

  // Extraction
  const inference =
    opts.inference !== undefined
      ? opts.inference
      : config.extraction.inferenceEnabled
        ? createModelInference()
        : null;
  const classifier = new TypeClassifier({
    inference,
    timeoutMs: config.extraction.inferenceTimeoutMs,
    minConfidence: config.extraction.inferenceMinConfidence,
    contextWords: config.extraction.contextWords,
  });
  const documentLocks = new KeyedLock();
  const extraction = createExtractionService({
    documents,
    sessions,
    classifier,
    documentLocks,
    options: {
      contextChars: config.extraction.contextChars,
      dedupeLabels: config.extraction.dedupeLabels,
    },
  });

  const assemblyPolicy = opts.assemblyPolicy ?? { allowSkipped: config.assembly.allowSkipped };

  // Conversation
  const machine = new ConversationMachine({
    validators: createValidators({
      dateFormats: config.validation.dateFormats,
      amountPrecision: config.validation.amountPrecision,
    }),
    now: opts.now,
    allowSkipped: assemblyPolicy.allowSkipped,
  });
  const conversations = new ConversationService({
    db,
    documents,
    sessions,
    machine,
    documentLocks,
    generateSessionId: opts.generateSessionId,
  });

  // Assembly
  const assembly = createAssemblyService(documents, assemblyPolicy);

  // Routes
  app.register(createHealthRoutes(db));
  app.register(createMetricsRoutes());
  app.register(
    createDocumentRoutes({
      documents,
      extraction,
      assembly,
      limitProcessing: inference !== null,
    })
  );
  app.register(createSessionRoutes({ conversations, documents, sessions }));

  return app;
}
