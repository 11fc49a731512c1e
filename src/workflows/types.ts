import type { MemoryEntry } from '../vault/content-store';

export interface Identity {
  currentUser: string;
  targetPersona: string;
}

export interface OracleSelection {
  reasoning: string;
  filePath: string;
  poeticMessage: string;
}

export type ArtifactKind = 'image' | 'video' | 'other';

export interface MemoryArtifact {
  path: string;
  kind: ArtifactKind;
  data: Buffer;
}

export type MemoryOracleResult =
  | { status: 'empty' }
  | { status: 'unavailable'; errors: string[] }
  | { status: 'unparseable'; provider: string; raw: string }
  | {
      status: 'ok';
      provider: string;
      selection: OracleSelection;
      /** Undefined when the chosen file is missing or cannot be decrypted. */
      artifact?: MemoryArtifact;
      memory?: MemoryEntry;
    };

export interface GhostMessage {
  role: 'user' | 'assistant';
  content: string;
  provider?: string;
}

export interface GhostWriterResult {
  reply: string;
  provider: string;
}
