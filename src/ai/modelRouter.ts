/* src/ai/modelRouter.ts
   Provider-agnostic "compose text" with provider/model/seed overrides.
   `openai` targets any OpenAI-compatible endpoint (OPENAI_BASE_URL, OpenRouter by default).
*/
import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import { config } from '../config';
import { createLogger } from '../observability/logger';
import { recordAiRequest } from '../observability/metrics';
import { withTimeout } from './timeout';
import type { AiAction, ModelInvocationOptions, ProviderId } from './types';

const log = createLogger('ai/modelRouter');

export interface ComposeOptions extends ModelInvocationOptions {
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  /** Metrics/log label */
  action?: AiAction;
  /** What the `dev` provider answers; lets callers stay deterministic offline */
  devStub?: string;
  timeoutMs?: number;
}

export interface ComposeResult {
  text: string;
  provider: ProviderId;
  model: string;
  /** Provider stop reason when it reports one ('stop', 'length', 'end_turn', ...) */
  finishReason?: string;
  raw?: unknown;
}

/* ------------------------------ helpers ------------------------------ */

function normalizeSeedNumber(seed?: string | number): number | undefined {
  if (seed == null) return undefined;
  const n = typeof seed === 'number' ? seed : Number(String(seed).trim());
  return Number.isFinite(n) ? Math.floor(n) : undefined;
}

let _openai: OpenAI | null = null;
function getOpenAI(): OpenAI {
  if (_openai) return _openai;
  if (!config.ai.openaiKey) {
    throw new Error('OPENAI_API_KEY is not set. Set it in your environment to use the openai provider.');
  }
  _openai = new OpenAI({ apiKey: config.ai.openaiKey, baseURL: config.ai.openaiBaseUrl });
  return _openai;
}

let _anthropic: Anthropic | null = null;
function getAnthropic(): Anthropic {
  if (_anthropic) return _anthropic;
  if (!config.ai.anthropicKey) {
    throw new Error('ANTHROPIC_API_KEY is not set. Set it in your environment to use the anthropic provider.');
  }
  _anthropic = new Anthropic({ apiKey: config.ai.anthropicKey });
  return _anthropic;
}

/** Anthropic replies in blocks; keep the text ones. */
function anthropicBlocksToText(content: Anthropic.Messages.ContentBlock[]): string {
  const out: string[] = [];
  for (const block of content) {
    if (block.type === 'text') {
      const t = block.text.trim();
      if (t) out.push(t);
    }
  }
  return out.join('\n\n').trim();
}

/* ------------------------------ providers ------------------------------ */

async function composeOpenAI(prompt: string, opts: ComposeOptions): Promise<ComposeResult> {
  const client = getOpenAI();
  const model = opts.model || config.ai.model.openai;

  const resp = await client.chat.completions.create({
    model,
    messages: [
      ...(opts.systemPrompt ? [{ role: 'system' as const, content: opts.systemPrompt }] : []),
      { role: 'user' as const, content: prompt },
    ],
    max_tokens: opts.maxTokens,
    temperature: opts.temperature,
    seed: normalizeSeedNumber(opts.seed),
  });

  const choice = resp.choices[0];
  const text = (choice?.message?.content ?? '').trim();
  return { text, provider: 'openai', model, finishReason: choice?.finish_reason, raw: resp };
}

async function composeAnthropic(prompt: string, opts: ComposeOptions): Promise<ComposeResult> {
  const client = getAnthropic();
  const model = opts.model || config.ai.model.anthropic;

  const resp = await client.messages.create({
    model,
    max_tokens: opts.maxTokens ?? 4096,
    temperature: opts.temperature,
    system: opts.systemPrompt || undefined,
    messages: [{ role: 'user', content: prompt }],
  });

  return {
    text: anthropicBlocksToText(resp.content),
    provider: 'anthropic',
    model,
    finishReason: resp.stop_reason ?? undefined,
    raw: resp,
  };
}

/* ------------------------------ main entry ------------------------------ */

/**
 * Canonical text generation entry used by the edit proposer and the
 * consistency analyzer. Times out after AI_TIMEOUT_MS; records ai_* metrics.
 */
export async function composeText(
  prompt: string,
  opts: ComposeOptions = {}
): Promise<ComposeResult> {
  const provider: ProviderId = opts.provider ?? config.ai.provider;
  const action = opts.action ?? 'propose_edits';
  const started = Date.now();

  if (provider === 'dev') {
    const model = opts.model || 'dev-stub-1';
    const text = opts.devStub ?? `Draft:\n${prompt}\n\n[dev stub; deterministic]`;
    recordAiRequest(action, provider, 'success', Date.now() - started);
    return { text, provider, model, finishReason: 'stop' };
  }

  const call = provider === 'openai' ? composeOpenAI(prompt, opts) : composeAnthropic(prompt, opts);

  try {
    const result = await withTimeout(
      call,
      opts.timeoutMs ?? config.ai.timeoutMs,
      `${provider} ${action} timed out`
    );
    recordAiRequest(action, provider, 'success', Date.now() - started);
    log.debug(
      { action, provider, model: result.model, finishReason: result.finishReason, chars: result.text.length },
      'model call completed'
    );
    return result;
  } catch (err) {
    recordAiRequest(action, provider, 'error', Date.now() - started);
    log.error({ err, action, provider }, 'model call failed');
    throw err;
  }
}
