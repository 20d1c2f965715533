import OpenAI from 'openai';
import type { AppConfig } from '../config';
import { ReplyGenerationError, type ChatMessage, type CompletionClient } from './replyGenerator';

/**
 * CompletionClient backed by OpenAI chat completions.
 * Without an API key every call rejects, which sends the engine to its fallback replies.
 */
export function createOpenAICompletionClient(options: AppConfig['openai']): CompletionClient {
  if (!options.apiKey) {
    return {
      complete: async () => {
        throw new ReplyGenerationError('OpenAI API key not configured');
      }
    };
  }

  const openai = new OpenAI({ apiKey: options.apiKey });

  return {
    async complete(messages: ChatMessage[]): Promise<string> {
      const response = await openai.chat.completions.create({
        model: options.model,
        messages,
        max_tokens: options.maxTokens,
        temperature: options.temperature
      });
      return response.choices[0]?.message.content ?? '';
    }
  };
}
