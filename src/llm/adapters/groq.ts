import type { HttpTransport } from '../../http/transport';
import type { ProviderAdapter } from '../provider';
import { createChatCompletionsAdapter } from './chat-completions';

export function createGroqAdapter(options: { baseUrl?: string; transport?: HttpTransport } = {}): ProviderAdapter {
  return createChatCompletionsAdapter({
    id: 'groq',
    baseUrl: options.baseUrl ?? 'https://api.groq.com/openai/v1',
    transport: options.transport
  });
}
