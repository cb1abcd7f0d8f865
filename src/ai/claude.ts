/**
 * Generative text client — Anthropic Claude primary, OpenAI fallback.
 *
 * The fallback is used only when Claude answers with a server error and an
 * OpenAI key is configured. Never import Anthropic/OpenAI directly elsewhere.
 */
import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';

let _anthropic: Anthropic | null = null;
let _openai: OpenAI | null = null;

function getAnthropic(): Anthropic {
  if (!env.ANTHROPIC_API_KEY) {
    throw new Error('ANTHROPIC_API_KEY is not set — required to interpret instructions');
  }
  if (!_anthropic) _anthropic = new Anthropic({ apiKey: env.ANTHROPIC_API_KEY });
  return _anthropic;
}

function getOpenAI(): OpenAI | null {
  if (!env.OPENAI_API_KEY) return null;
  if (!_openai) _openai = new OpenAI({ apiKey: env.OPENAI_API_KEY });
  return _openai;
}

export interface CompletionResponse {
  text: string;
  provider: 'anthropic' | 'openai';
  inputTokens: number;
  outputTokens: number;
}

async function openaiCompletion(
  client: OpenAI,
  prompt: string,
  systemPrompt: string | undefined,
  maxTokens: number,
): Promise<CompletionResponse> {
  const res = await client.chat.completions.create({
    model: env.OPENAI_MODEL,
    max_tokens: maxTokens,
    messages: [
      ...(systemPrompt ? [{ role: 'system' as const, content: systemPrompt }] : []),
      { role: 'user' as const, content: prompt },
    ],
  });
  return {
    text:         res.choices[0]?.message?.content ?? '',
    provider:     'openai',
    inputTokens:  res.usage?.prompt_tokens ?? 0,
    outputTokens: res.usage?.completion_tokens ?? 0,
  };
}

/**
 * Text completion (no vision).
 *
 * @param systemPrompt Optional system prompt.
 * @param maxTokens    Response token budget (default 1000).
 */
export async function generateCompletion(
  prompt: string,
  systemPrompt?: string,
  maxTokens = 1_000,
): Promise<CompletionResponse> {
  logger.debug('claude.generateCompletion', { model: env.ANTHROPIC_MODEL, maxTokens });

  try {
    const res = await getAnthropic().messages.create({
      model: env.ANTHROPIC_MODEL,
      max_tokens: maxTokens,
      ...(systemPrompt ? { system: systemPrompt } : {}),
      messages: [{ role: 'user', content: prompt }],
    });

    const text = res.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('');
    logger.debug('claude.generateCompletion complete', {
      inputTokens: res.usage.input_tokens,
      outputTokens: res.usage.output_tokens,
    });

    return {
      text,
      provider:     'anthropic',
      inputTokens:  res.usage.input_tokens,
      outputTokens: res.usage.output_tokens,
    };
  } catch (err) {
    const fallback = getOpenAI();
    if (err instanceof Anthropic.APIError && (err.status ?? 0) >= 500 && fallback) {
      logger.warn('Anthropic unavailable — falling back to OpenAI', { status: err.status });
      return openaiCompletion(fallback, prompt, systemPrompt, maxTokens);
    }
    throw err;
  }
}
