/**
 * Text generation client: Claude via the Anthropic Messages API.
 *
 * The script writer only sees the TextGenerator interface; never import
 * Anthropic directly in pipeline modules.
 */
import Anthropic from '@anthropic-ai/sdk';
import type { ShortsConfig } from '../config.js';
import { logger } from '../utils/logger.js';

// ── Public interfaces ─────────────────────────────────────────────────────────

export interface TextGenerator {
  complete(prompt: string, systemPrompt?: string): Promise<string>;
}

export interface ClaudeResponse {
  text: string;
  inputTokens: number;
  outputTokens: number;
}

// ── Text completion ───────────────────────────────────────────────────────────

/**
 * General-purpose text completion (no vision).
 *
 * @param systemPrompt Optional system prompt; omitted from the request when absent.
 * @param maxTokens    Response token budget.
 */
export async function generateCompletion(
  client: Anthropic,
  model: string,
  prompt: string,
  systemPrompt?: string,
  maxTokens = 1_000,
): Promise<ClaudeResponse> {
  logger.debug('claude.generateCompletion', { model, maxTokens });

  const res = await client.messages.create({
    model,
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
    inputTokens:  res.usage.input_tokens,
    outputTokens: res.usage.output_tokens,
  };
}

export function createClaudeGenerator(settings: ShortsConfig['generation']): TextGenerator {
  const client = new Anthropic({ apiKey: settings.api_key });
  return {
    complete: async (prompt, systemPrompt) => {
      const res = await generateCompletion(client, settings.model, prompt, systemPrompt, settings.max_tokens);
      return res.text;
    },
  };
}
