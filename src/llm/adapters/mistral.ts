import type { HttpTransport } from '../../http/transport';
import type { ProviderAdapter } from '../provider';
import { createChatCompletionsAdapter } from './chat-completions';

export function createMistralAdapter(options: { baseUrl?: string; transport?: HttpTransport } = {}): ProviderAdapter {
  return createChatCompletionsAdapter({
    id: 'mistral',
    baseUrl: options.baseUrl ?? 'https://api.mistral.ai/v1',
    transport: options.transport
  });
}
