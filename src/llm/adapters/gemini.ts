import { ProviderCallError } from '../../errors';
import { HttpTransport } from '../../http/transport';
import { isRecord } from '../../utils/json';
import type { GenerationRequest, ProviderAdapter, ProviderCallConfig, ProviderReply } from '../provider';

const DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

export interface GeminiAdapterOptions {
  baseUrl?: string;
  transport?: HttpTransport;
}

function flattenCandidateText(raw: unknown): string {
  if (!isRecord(raw) || !Array.isArray(raw.candidates)) {
    return '';
  }

  const first: unknown = raw.candidates[0];
  if (!isRecord(first) || !isRecord(first.content) || !Array.isArray(first.content.parts)) {
    return '';
  }

  const chunks: string[] = [];
  for (const part of first.content.parts) {
    if (isRecord(part) && typeof part.text === 'string') {
      chunks.push(part.text);
    }
  }
  return chunks.join('').trim();
}

function blockReason(raw: unknown): string | undefined {
  if (isRecord(raw) && isRecord(raw.promptFeedback) && typeof raw.promptFeedback.blockReason === 'string') {
    return raw.promptFeedback.blockReason;
  }
  return undefined;
}

export function createGeminiAdapter(options: GeminiAdapterOptions = {}): ProviderAdapter {
  const baseUrl = new URL(options.baseUrl ?? DEFAULT_BASE_URL).toString().replace(/\/$/, '');
  const transport = options.transport ?? new HttpTransport();

  return {
    id: 'gemini',
    async generate(request: GenerationRequest, config: ProviderCallConfig): Promise<ProviderReply> {
      const response = await transport.postJson({
        provider: 'gemini',
        url: `${baseUrl}/models/${encodeURIComponent(config.model)}:generateContent`,
        headers: { 'x-goog-api-key': config.apiKey },
        timeoutMs: config.timeoutMs,
        body: {
          contents: [{ role: 'user', parts: [{ text: request.prompt }] }],
          ...(request.systemInstruction ? { systemInstruction: { parts: [{ text: request.systemInstruction }] } } : {}),
          generationConfig: {
            responseMimeType: request.jsonMode ? 'application/json' : 'text/plain'
          }
        }
      });

      const text = flattenCandidateText(response.data);
      if (!text) {
        const reason = blockReason(response.data);
        throw new ProviderCallError({
          provider: 'gemini',
          message: reason ? `Prompt blocked (${reason})` : 'Empty response',
          status: response.status,
          details: response.data
        });
      }

      return { text, raw: response.data };
    }
  };
}
