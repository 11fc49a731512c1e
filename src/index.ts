export { createCli, runCli } from './cli/index';
export type { CliRuntime } from './cli/index';

export { loadConfig } from './config';
export type { GateConfig, ProviderModels, VaultConfig } from './config';

export {
  AccessGate,
  GATE_NOTICES,
  VALID_FINGERPRINTS,
  canonicalizeDatePhrase,
  createAttemptLedger
} from './gate/access-gate';
export type { AttemptLedger, GateDecision, GateReason } from './gate/access-gate';

export { ProviderEnsemble, sentinelText } from './llm/ensemble';
export type { AdapterFactory, CreateEnsembleOptions, EnsembleMember } from './llm/ensemble';
export { NO_PROVIDER, PROVIDER_ORDER } from './llm/provider';
export type {
  GenerationRequest,
  GenerationResult,
  ProviderAdapter,
  ProviderCallConfig,
  ProviderConfig,
  ProviderId
} from './llm/provider';
export { createGeminiAdapter } from './llm/adapters/gemini';
export { createMistralAdapter } from './llm/adapters/mistral';
export { createGroqAdapter } from './llm/adapters/groq';

export { ContentStore, tailText } from './vault/content-store';
export type { ContentKind, MemoryEntry } from './vault/content-store';
export { VaultCipher, createVaultCipher, decodeVaultKey, generateVaultKey } from './vault/cipher';
export { collectVaultTargets, encryptVault, loadOrCreateKey } from './vault/encrypt';

export { VaultSession } from './session/vault-session';
export type { SessionStage, VaultSessionDeps } from './session/vault-session';
export { runMemoryOracle, classifyArtifact } from './workflows/memory-oracle';
export { runGhostWriter } from './workflows/ghost-writer';
export type {
  GhostMessage,
  GhostWriterResult,
  Identity,
  MemoryArtifact,
  MemoryOracleResult,
  OracleSelection
} from './workflows/types';

export { createKeychainStore, MemoryKeychain } from './secure/keychain';
export type { KeychainStore } from './secure/keychain';
export { createDefaultSecretResolver, createSecretResolver, EnvSecretSource, FileSecretSource } from './secure/secrets';
export type { ResolveSecret, SecretName, SecretSource } from './secure/secrets';

export * from './errors';
export { toProblemDetails } from './contracts/problem';
export type { ProblemDetails } from './contracts/problem';
