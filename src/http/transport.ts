import { ProviderCallError } from '../errors';
import { getLogger } from '../observability/logger';
import { withSpan } from '../observability/tracing';

export interface TransportOptions {
  timeoutMs?: number;
}

export interface JsonPostRequest {
  provider: string;
  url: string;
  headers?: Record<string, string>;
  body: unknown;
  timeoutMs?: number;
}

export interface TransportResponse {
  status: number;
  data: unknown;
  durationMs: number;
}

async function parseResponseBody(response: Response): Promise<unknown> {
  const contentType = response.headers.get('content-type')?.toLowerCase() ?? '';
  if (contentType.includes('application/json')) {
    try {
      const data: unknown = await response.json();
      return data;
    } catch {
      return undefined;
    }
  }

  const text = await response.text();
  return text ? { message: text } : undefined;
}

function redactUrl(url: string): string {
  const parsed = new URL(url);
  if (parsed.searchParams.has('key')) {
    parsed.searchParams.set('key', 'redacted');
  }
  return parsed.toString();
}

/**
 * Single-attempt JSON POST with a hard deadline. Provider fallback happens one
 * level up, so nothing here retries.
 */
export class HttpTransport {
  private readonly timeoutMs: number;
  private readonly logger = getLogger();

  constructor(options: TransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async postJson(request: JsonPostRequest): Promise<TransportResponse> {
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;
    const started = Date.now();
    const url = redactUrl(request.url);

    return withSpan(
      'vault.http.post',
      {
        'vault.provider': request.provider,
        'http.method': 'POST',
        'http.url': url
      },
      async (span) => {
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), timeoutMs);

        try {
          const response = await fetch(request.url, {
            method: 'POST',
            headers: {
              'Content-Type': 'application/json',
              ...request.headers
            },
            body: JSON.stringify(request.body),
            signal: controller.signal
          });

          const data = await parseResponseBody(response);
          span.setAttribute('http.status_code', response.status);
          if (!response.ok) {
            throw new ProviderCallError({
              provider: request.provider,
              message: `HTTP ${response.status} ${response.statusText}: ${JSON.stringify(data ?? null)}`,
              status: response.status,
              details: data
            });
          }

          const durationMs = Date.now() - started;
          this.logger.debug({ provider: request.provider, url, status: response.status, durationMs }, 'Provider request completed');
          return { status: response.status, data, durationMs };
        } catch (error) {
          if (controller.signal.aborted) {
            throw new ProviderCallError({
              provider: request.provider,
              message: `Request timed out after ${timeoutMs}ms`
            });
          }
          throw error;
        } finally {
          clearTimeout(timeout);
        }
      }
    );
  }
}
