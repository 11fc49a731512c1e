import { errorMessage } from '../errors';
import { getLogger } from '../observability/logger';
import type { ResolveSecret } from '../secure/secrets';
import type { ProviderModels } from '../config';
import { createGeminiAdapter } from './adapters/gemini';
import { createGroqAdapter } from './adapters/groq';
import { createMistralAdapter } from './adapters/mistral';
import {
  NO_PROVIDER,
  PROVIDER_ORDER,
  type GenerationRequest,
  type GenerationResult,
  type ProviderAdapter,
  type ProviderConfig,
  type ProviderId
} from './provider';

export type AdapterFactory = () => ProviderAdapter;

export interface EnsembleMember {
  config: ProviderConfig;
  adapter?: ProviderAdapter;
  apiKey?: string;
}

export interface CreateEnsembleOptions {
  resolveSecret: ResolveSecret;
  models: ProviderModels;
  timeoutMs: number;
  adapterFactories?: Partial<Record<ProviderId, AdapterFactory>>;
}

const DEFAULT_FACTORIES: Record<ProviderId, AdapterFactory> = {
  gemini: () => createGeminiAdapter(),
  mistral: () => createMistralAdapter(),
  groq: () => createGroqAdapter()
};

export function sentinelText(errors: string[], jsonMode: boolean): string {
  if (jsonMode) {
    return JSON.stringify({ error: 'All LLMs failed', details: errors });
  }
  return `System Malfunction. All AI Cores Unresponsive. Errors: ${errors.join('; ')}`;
}

/**
 * Ordered fallback over the configured providers. One call tries each
 * available provider at most once, in rank order, and stops at the first
 * answer.
 */
export class ProviderEnsemble {
  private readonly members: EnsembleMember[];
  private readonly timeoutMs: number;
  private readonly logger = getLogger();

  constructor(members: EnsembleMember[], options: { timeoutMs: number }) {
    this.members = [...members].sort((left, right) => left.config.rank - right.config.rank);
    this.timeoutMs = options.timeoutMs;
  }

  static async create(options: CreateEnsembleOptions): Promise<ProviderEnsemble> {
    const logger = getLogger();
    const members: EnsembleMember[] = [];

    for (const descriptor of PROVIDER_ORDER) {
      const config: ProviderConfig = {
        id: descriptor.id,
        name: descriptor.name,
        rank: descriptor.rank,
        model: options.models[descriptor.id],
        available: false
      };

      const apiKey = await options.resolveSecret(descriptor.secret);
      if (!apiKey) {
        config.unavailableReason = `${descriptor.secret} not found`;
        if (descriptor.rank === 1) {
          logger.warn({ provider: descriptor.name }, `${descriptor.secret} not found in secrets.`);
        }
        members.push({ config });
        continue;
      }

      const factory = options.adapterFactories?.[descriptor.id] ?? DEFAULT_FACTORIES[descriptor.id];
      try {
        const adapter = factory();
        members.push({ config: { ...config, available: true }, adapter, apiKey });
      } catch (error) {
        config.unavailableReason = `${descriptor.name} init error: ${errorMessage(error)}`;
        logger.error({ provider: descriptor.name, error: errorMessage(error) }, 'Provider client construction failed');
        members.push({ config });
      }
    }

    return new ProviderEnsemble(members, { timeoutMs: options.timeoutMs });
  }

  providers(): ProviderConfig[] {
    return this.members.map((member) => ({ ...member.config }));
  }

  hasAvailableProvider(): boolean {
    return this.members.some((member) => member.config.available);
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const errors: string[] = [];

    for (const member of this.members) {
      const { adapter, apiKey, config } = member;
      if (!config.available || !adapter || !apiKey) {
        continue;
      }

      try {
        const reply = await adapter.generate(request, {
          apiKey,
          model: config.model,
          timeoutMs: this.timeoutMs
        });
        this.logger.info({ provider: config.name, model: config.model, skipped: errors.length }, 'Generation succeeded');
        return { text: reply.text, provider: config.name, model: config.model, errors: [] };
      } catch (error) {
        const message = `${config.name} failed: ${errorMessage(error)}`;
        errors.push(message);
        this.logger.warn({ provider: config.name, error: errorMessage(error) }, 'Provider failed; trying next');
      }
    }

    if (errors.length === 0) {
      errors.push('No providers available');
    }
    this.logger.error({ errors }, 'All providers failed');
    return {
      text: sentinelText(errors, Boolean(request.jsonMode)),
      provider: NO_PROVIDER,
      errors
    };
  }
}
