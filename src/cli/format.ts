import type { ProviderConfig } from '../llm/provider';
import type { GhostWriterResult, MemoryOracleResult } from '../workflows/types';

export function formatOracleText(result: MemoryOracleResult, memoriesPath: string): string {
  if (result.status === 'empty') {
    return `Memory banks are empty (${memoriesPath} not found).`;
  }
  if (result.status === 'unavailable') {
    return `The Oracle is clouded: ${result.errors.join('; ')}`;
  }
  if (result.status === 'unparseable') {
    return `Oracle returned gibberish (${result.provider}): ${result.raw}`;
  }

  const lines = [`"${result.selection.poeticMessage}"`, '', `AI MODEL: ${result.provider}`, `SELECTION LOGIC: ${result.selection.reasoning}`];
  if (result.artifact) {
    lines.push(`ARTIFACT: ${result.artifact.path} (${result.artifact.kind}, ${result.artifact.data.length} bytes)`);
  } else {
    lines.push(`Memory artifact missing or locked: ${result.selection.filePath}`);
  }
  return lines.join('\n');
}

export function formatGhostText(persona: string, result: GhostWriterResult): string {
  return `${persona}: ${result.reply}\n(Thought from: ${result.provider})`;
}

export function formatProvidersText(providers: ProviderConfig[]): string {
  return providers
    .map((provider) => {
      const state = provider.available ? 'available' : `unavailable (${provider.unavailableReason ?? 'unknown'})`;
      return `${provider.rank}. ${provider.name} [${provider.model}] ${state}`;
    })
    .join('\n');
}
