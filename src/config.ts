/* src/config.ts
   Centralized config, read once from the environment (.env supported) */
import 'dotenv/config';


const env = (name: string, fallback?: string) =>
  (process.env[name] ?? fallback ?? '').toString();

const envInt = (name: string, fallback: number) => {
  const n = Number.parseInt(env(name), 10);
  return Number.isFinite(n) ? n : fallback;
};

const envBool = (name: string, fallback: boolean) => {
  const raw = env(name).trim().toLowerCase();
  if (!raw) return fallback;
  return raw === 'true' || raw === '1';
};

export type AIProvider = 'dev' | 'openai' | 'anthropic';

const KNOWN_PROVIDERS: readonly AIProvider[] = ['dev', 'openai', 'anthropic'];

function parseProvider(raw: string): AIProvider {
  const p = raw.trim().toLowerCase();
  return KNOWN_PROVIDERS.find((k) => k === p) ?? 'dev';
}

export const config = {
  // ── HTTP server ──────────────────────────────────────────────────
  server: {
    host: env('HOST', '0.0.0.0'),
    port: envInt('PORT', 4000),
    bodyLimitBytes: envInt('BODY_LIMIT_BYTES', 10 * 1024 * 1024),
  },

  // ── CORS origins ─────────────────────────────────────────────────
  cors: {
    origins: env('CORS_ORIGINS', 'http://localhost:5173')
      .split(',')
      .map(s => s.trim())
      .filter(Boolean),
  },

  // ── AI ───────────────────────────────────────────────────────────
  // `openai` talks to any OpenAI-compatible endpoint (OpenRouter by default).
  ai: {
    provider: parseProvider(env('AI_PROVIDER', 'dev')),
    openaiKey: env('OPENAI_API_KEY'),
    openaiBaseUrl: env('OPENAI_BASE_URL', 'https://openrouter.ai/api/v1'),
    anthropicKey: env('ANTHROPIC_API_KEY'),
    model: {
      openai: env('AI_MODEL_OPENAI', 'anthropic/claude-3.5-sonnet'),
      anthropic: env('AI_MODEL_ANTHROPIC', 'claude-sonnet-4-5-20250929'),
    },
    timeoutMs: envInt('AI_TIMEOUT_MS', 120_000),
  },

  // ── Retrieval index ──────────────────────────────────────────────
  retrieval: {
    searchUrl: env('RAG_SEARCH_URL', 'http://localhost:1234/search'),
    projectId: env('RAG_PROJECT_ID', 'default'),
    topK: envInt('RAG_TOP_K', 5),
    useRefine: envBool('RAG_USE_REFINE', true),
    timeoutMs: envInt('RAG_TIMEOUT_MS', 30_000),
    // Indexing endpoint that pulls a document from the store into the index
    processUrl: env('KB_PROCESS_URL', 'http://localhost:1234/process'),
    uploadTimeoutMs: envInt('KB_UPLOAD_TIMEOUT_MS', 120_000),
  },

  // ── Document storage (HTTP object store) ─────────────────────────
  documents: {
    fetchTimeoutMs: envInt('DOCUMENT_FETCH_TIMEOUT_MS', 30_000),
  },

  // ── Patching ─────────────────────────────────────────────────────
  patch: {
    sweepDuplicates: envBool('PATCH_SWEEP_DUPLICATES', true),
  },
} as const;
