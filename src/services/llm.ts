/**
 * LLM integration layer using Vercel AI SDK.
 * Supports Anthropic and OpenAI models.
 */

import { generateText } from 'ai';
import type { LanguageModel } from 'ai';
import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import type { LLMConfig } from '../config.js';
import { logger } from '../utils/logger.js';

/**
 * Initialize the language model for the configured provider.
 */
export function createLanguageModel(llm: LLMConfig): LanguageModel {
  logger.info(`Initializing LLM: ${llm.provider}/${llm.model}`);

  switch (llm.provider) {
    case 'anthropic':
      return createAnthropic({ apiKey: llm.apiKey })(llm.model);
    case 'openai':
      return createOpenAI({ apiKey: llm.apiKey })(llm.model);
  }
}

export interface CompletionOptions {
  /** Sampling temperature (0.0 for deterministic) */
  temperature?: number;
  /** Maximum tokens in response */
  maxOutputTokens?: number;
  /** Aborts the underlying HTTP request */
  abortSignal?: AbortSignal;
}

/**
 * Call the model for a plain text response.
 *
 * Single attempt: callers own timeouts and fallbacks, so the SDK's own retry
 * loop is disabled.
 */
export async function callLLM(
  model: LanguageModel,
  prompt: string,
  system: string,
  options: CompletionOptions = {}
): Promise<string> {
  const result = await generateText({
    model,
    system,
    prompt,
    temperature: options.temperature ?? 0.0,
    maxOutputTokens: options.maxOutputTokens ?? 1024,
    abortSignal: options.abortSignal,
    maxRetries: 0,
  });

  // Log token usage
  logger.debug(
    `LLM API call successful - Input: ${result.usage.inputTokens}, Output: ${result.usage.outputTokens}`
  );

  return result.text;
}
