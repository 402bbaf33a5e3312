/**
 * @fileoverview Provider exports
 */

export * from './base.js';
export * from './http.js';
export * from './error-mapping.js';
export * from './claude.js';
export * from './openai.js';
export * from './text-protocol.js';

import { LLMProvider, type BaseProvider, type ProviderConfig } from './base.js';
import { ClaudeProvider } from './claude.js';
import { OpenAIProvider } from './openai.js';
import { ConfigError } from '../types/errors.js';

/**
 * Create an HTTP provider instance based on type. Text-protocol providers
 * wrap a completion function and are constructed directly.
 */
export function createProvider(config: ProviderConfig): BaseProvider {
  switch (config.provider) {
    case LLMProvider.CLAUDE:
      return new ClaudeProvider(config);

    case LLMProvider.OPENAI:
      return new OpenAIProvider(config);

    default:
      throw new ConfigError(`Unsupported HTTP provider: ${config.provider}`);
  }
}
