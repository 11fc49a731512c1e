import type { SecretName } from '../secure/secrets';

export type ProviderId = 'gemini' | 'mistral' | 'groq';

export const NO_PROVIDER = 'none';

export interface GenerationRequest {
  prompt: string;
  systemInstruction?: string;
  /** Ask the provider for its native JSON output mode. */
  jsonMode?: boolean;
}

export interface ProviderCallConfig {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export interface ProviderReply {
  text: string;
  raw: unknown;
}

export interface ProviderAdapter {
  readonly id: ProviderId;
  generate(request: GenerationRequest, config: ProviderCallConfig): Promise<ProviderReply>;
}

export interface ProviderDescriptor {
  id: ProviderId;
  name: string;
  rank: number;
  secret: SecretName;
}

export interface ProviderConfig {
  id: ProviderId;
  name: string;
  rank: number;
  model: string;
  available: boolean;
  unavailableReason?: string;
}

export interface GenerationResult {
  text: string;
  /** Display name of the provider that answered, or `none`. */
  provider: string;
  model?: string;
  /** Per-provider failures; only populated on the `none` sentinel. */
  errors: string[];
}

export const PROVIDER_ORDER: readonly ProviderDescriptor[] = [
  { id: 'gemini', name: 'Gemini', rank: 1, secret: 'GOOGLE_API_KEY' },
  { id: 'mistral', name: 'Mistral', rank: 2, secret: 'MISTRAL_API_KEY' },
  { id: 'groq', name: 'Groq', rank: 3, secret: 'GROQ_API_KEY' }
];
