import { VaultConfigError, VaultStateError } from '../errors';
import { AccessGate, createAttemptLedger, type AttemptLedger, type GateDecision } from '../gate/access-gate';
import type { ProviderEnsemble } from '../llm/ensemble';
import { getLogger } from '../observability/logger';
import type { ContentStore } from '../vault/content-store';
import { runGhostWriter } from '../workflows/ghost-writer';
import { runMemoryOracle } from '../workflows/memory-oracle';
import type { GhostMessage, GhostWriterResult, Identity, MemoryOracleResult } from '../workflows/types';

export type SessionStage = 'locked' | 'identifying' | 'open';

export interface VaultSessionDeps {
  gate: AccessGate;
  ensemble: ProviderEnsemble;
  store: ContentStore;
  participants?: [string, string];
}

/**
 * One user's walk through the vault: the gate, then picking who is talking,
 * then the features. Owns the attempt ledger and the ghost-writer thread.
 */
export class VaultSession {
  readonly ledger: AttemptLedger = createAttemptLedger();
  readonly ghostMessages: GhostMessage[] = [];
  private currentStage: SessionStage = 'locked';
  private currentIdentity?: Identity;

  constructor(private readonly deps: VaultSessionDeps) {}

  get stage(): SessionStage {
    return this.currentStage;
  }

  get identity(): Identity | undefined {
    return this.currentIdentity ? { ...this.currentIdentity } : undefined;
  }

  participants(): [string, string] {
    if (!this.deps.participants) {
      throw new VaultConfigError('No participants configured. Set MEMORY_VAULT_PARTICIPANTS="NameA,NameB".');
    }
    return this.deps.participants;
  }

  unlock(candidate: string): GateDecision {
    if (this.currentStage !== 'locked') {
      return { verdict: true, reason: 'granted' };
    }
    const decision = this.deps.gate.evaluate(candidate, this.ledger);
    if (decision.verdict === true) {
      this.currentStage = 'identifying';
      getLogger().info('Vault unlocked');
    }
    return decision;
  }

  identify(name: string): Identity {
    if (this.currentStage === 'locked') {
      throw new VaultStateError('Unlock the vault before choosing an identity.');
    }

    const [first, second] = this.participants();
    const needle = name.trim().toLowerCase();
    let identity: Identity;
    if (needle === first.toLowerCase()) {
      identity = { currentUser: first, targetPersona: second };
    } else if (needle === second.toLowerCase()) {
      identity = { currentUser: second, targetPersona: first };
    } else {
      throw new VaultConfigError(`Unknown identity "${name}". Expected ${first} or ${second}.`);
    }

    this.currentIdentity = identity;
    this.currentStage = 'open';
    return { ...identity };
  }

  async consultOracle(mood: string): Promise<MemoryOracleResult> {
    return runMemoryOracle({ ensemble: this.deps.ensemble, store: this.deps.store, identity: this.requireOpen(), mood });
  }

  async sendGhostMessage(message: string): Promise<GhostWriterResult> {
    const identity = this.requireOpen();
    this.ghostMessages.push({ role: 'user', content: message });
    const result = await runGhostWriter({ ensemble: this.deps.ensemble, store: this.deps.store, identity, message });
    this.ghostMessages.push({ role: 'assistant', content: result.reply, provider: result.provider });
    return result;
  }

  private requireOpen(): Identity {
    if (this.currentStage !== 'open' || !this.currentIdentity) {
      throw new VaultStateError(`Vault features are unavailable while the session is ${this.currentStage}.`);
    }
    return this.currentIdentity;
  }
}
