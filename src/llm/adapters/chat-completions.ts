import { ProviderCallError } from '../../errors';
import { HttpTransport } from '../../http/transport';
import { isRecord } from '../../utils/json';
import type { GenerationRequest, ProviderAdapter, ProviderCallConfig, ProviderId, ProviderReply } from '../provider';

export interface ChatCompletionsAdapterOptions {
  id: ProviderId;
  baseUrl: string;
  transport?: HttpTransport;
}

type ChatMessage = { role: 'system' | 'user'; content: string };

function endpointFor(baseUrl: string): string {
  const root = new URL(baseUrl).toString().replace(/\/$/, '');
  return `${root}/chat/completions`;
}

function flattenChoiceMessage(raw: unknown): string {
  if (!isRecord(raw) || !Array.isArray(raw.choices)) {
    return '';
  }
  const choice: unknown = raw.choices[0];
  if (!isRecord(choice) || !isRecord(choice.message)) {
    return '';
  }

  const content = choice.message.content;
  if (typeof content === 'string') {
    return content.trim();
  }

  if (Array.isArray(content)) {
    return content
      .map((item: unknown) => {
        if (typeof item === 'string') {
          return item;
        }
        if (isRecord(item) && item.type === 'text' && typeof item.text === 'string') {
          return item.text;
        }
        return '';
      })
      .filter(Boolean)
      .join('\n')
      .trim();
  }

  return '';
}

function buildMessages(request: GenerationRequest): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (request.systemInstruction) {
    messages.push({ role: 'system', content: request.systemInstruction });
  }
  messages.push({ role: 'user', content: request.prompt });
  return messages;
}

/** OpenAI-style `/chat/completions` endpoint, as served by Mistral and Groq. */
export function createChatCompletionsAdapter(options: ChatCompletionsAdapterOptions): ProviderAdapter {
  const url = endpointFor(options.baseUrl);
  const transport = options.transport ?? new HttpTransport();

  return {
    id: options.id,
    async generate(request: GenerationRequest, config: ProviderCallConfig): Promise<ProviderReply> {
      const response = await transport.postJson({
        provider: options.id,
        url,
        headers: { Authorization: `Bearer ${config.apiKey}` },
        timeoutMs: config.timeoutMs,
        body: {
          model: config.model,
          messages: buildMessages(request),
          ...(request.jsonMode ? { response_format: { type: 'json_object' } } : {})
        }
      });

      const text = flattenChoiceMessage(response.data);
      if (!text) {
        throw new ProviderCallError({
          provider: options.id,
          message: 'Empty response',
          status: response.status,
          details: response.data
        });
      }

      return { text, raw: response.data };
    }
  };
}
