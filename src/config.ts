/* src/config.ts
   Centralized config, read once from the environment (.env via dotenv) */
import path from 'node:path';
import 'dotenv/config';

const env = (name: string, fallback?: string) =>
  (process.env[name] ?? fallback ?? '').toString();

const envInt = (name: string, fallback: number) => {
  const n = Number.parseInt(env(name), 10);
  return Number.isFinite(n) ? n : fallback;
};

const envFloat = (name: string, fallback: number) => {
  const n = Number.parseFloat(env(name));
  return Number.isFinite(n) ? n : fallback;
};

const envBool = (name: string, fallback: boolean) => {
  const raw = env(name).trim().toLowerCase();
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  return fallback;
};

const envList = (name: string, fallback: string) =>
  env(name, fallback)
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);

export type AIProvider = 'dev' | 'openai' | 'anthropic';

const AI_PROVIDERS: readonly AIProvider[] = ['dev', 'openai', 'anthropic'];

function parseProvider(raw: string): AIProvider {
  const found = AI_PROVIDERS.find(p => p === raw.trim().toLowerCase());
  return found ?? 'dev';
}

const dbPathRaw = env('BLANKFILL_DB_PATH', 'data/blankfill.db');

export const config = {
  nodeEnv: env('NODE_ENV', 'development'),
  port: envInt('PORT', 4000),

  // ── Database ─────────────────────────────────────────────────────
  database: {
    // ':memory:' is passed through untouched
    path: dbPathRaw === ':memory:' ? dbPathRaw : path.resolve(process.cwd(), dbPathRaw),
  },

  // ── CORS ─────────────────────────────────────────────────────────
  cors: {
    origins: envList('CORS_ORIGINS', 'http://localhost:5173'),
  },

  // ── AI (semantic inference collaborator) ────────────────────────
  ai: {
    provider: parseProvider(env('AI_PROVIDER', 'dev')),
    openaiKey: env('OPENAI_API_KEY'),
    anthropicKey: env('ANTHROPIC_API_KEY'),
    model: {
      openai: env('AI_MODEL_OPENAI', 'gpt-4o-mini'),
      anthropic: env('AI_MODEL_ANTHROPIC', 'claude-sonnet-4-5-20250929'),
    },
  },

  // ── Extraction ───────────────────────────────────────────────────
  extraction: {
    contextChars: envInt('EXTRACTION_CONTEXT_CHARS', 60),
    contextWords: envInt('EXTRACTION_CONTEXT_WORDS', 6),
    dedupeLabels: envBool('EXTRACTION_DEDUPE_LABELS', true),
    inferenceEnabled: envBool('INFERENCE_ENABLED', false),
    inferenceTimeoutMs: envInt('INFERENCE_TIMEOUT_MS', 2000),
    inferenceMinConfidence: envFloat('INFERENCE_MIN_CONFIDENCE', 0.75),
  },

  // ── Validation ───────────────────────────────────────────────────
  validation: {
    dateFormats: envList('DATE_FORMATS', 'iso,us,us-dash,month-name,day-month-name'),
    amountPrecision: envInt('AMOUNT_PRECISION', 2),
  },

  // ── Assembly ─────────────────────────────────────────────────────
  assembly: {
    allowSkipped: envBool('ASSEMBLY_ALLOW_SKIPPED', true),
  },

  metrics: {
    enabled: envBool('METRICS_ENABLED', true),
    prefix: env('METRICS_PREFIX', 'blankfill'),
  },
} as const;

export type AppConfig = typeof config;
