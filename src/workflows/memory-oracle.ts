import path from 'node:path';

import { z } from 'zod';

import type { ProviderEnsemble } from '../llm/ensemble';
import { buildMemoryOraclePrompt } from '../llm/prompts/memory-oracle';
import { NO_PROVIDER } from '../llm/provider';
import { getLogger } from '../observability/logger';
import { extractFirstJsonObject } from '../utils/json';
import type { ContentStore } from '../vault/content-store';
import type { ArtifactKind, Identity, MemoryArtifact, MemoryOracleResult } from './types';

const OracleReplySchema = z.object({
  reasoning: z.string().optional(),
  file_path: z.string().optional(),
  poetic_message: z.string().optional()
});

const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg']);
const VIDEO_EXTENSIONS = new Set(['.mp4', '.mov']);

export function classifyArtifact(filePath: string): ArtifactKind {
  const extension = path.extname(filePath).toLowerCase();
  if (IMAGE_EXTENSIONS.has(extension)) {
    return 'image';
  }
  if (VIDEO_EXTENSIONS.has(extension)) {
    return 'video';
  }
  return 'other';
}

export interface MemoryOracleInput {
  ensemble: ProviderEnsemble;
  store: ContentStore;
  identity: Identity;
  mood: string;
}

export async function runMemoryOracle(input: MemoryOracleInput): Promise<MemoryOracleResult> {
  const memories = await input.store.loadMemories();
  if (!memories.length) {
    return { status: 'empty' };
  }

  const result = await input.ensemble.generate({
    prompt: buildMemoryOraclePrompt({
      currentUser: input.identity.currentUser,
      targetPersona: input.identity.targetPersona,
      mood: input.mood,
      memories
    }),
    jsonMode: true
  });

  if (result.provider === NO_PROVIDER) {
    return { status: 'unavailable', errors: result.errors };
  }

  const parsed = OracleReplySchema.safeParse(extractFirstJsonObject(result.text));
  if (!parsed.success) {
    getLogger().warn({ provider: result.provider }, 'Oracle reply is not a JSON object');
    return { status: 'unparseable', provider: result.provider, raw: result.text };
  }

  const selection = {
    reasoning: parsed.data.reasoning ?? 'N/A',
    filePath: parsed.data.file_path ?? '',
    poeticMessage: parsed.data.poetic_message ?? ''
  };

  let artifact: MemoryArtifact | undefined;
  if (selection.filePath) {
    const data = await input.store.resolve(selection.filePath, 'bytes');
    if (data) {
      artifact = { path: selection.filePath, kind: classifyArtifact(selection.filePath), data };
    }
  }

  return {
    status: 'ok',
    provider: result.provider,
    selection,
    artifact,
    memory: memories.find((entry) => entry.file_path === selection.filePath)
  };
}
