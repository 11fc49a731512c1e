import type { ProviderEnsemble } from '../llm/ensemble';
import { buildGhostWriterPrompt, ghostWriterSystemInstruction } from '../llm/prompts/ghost-writer';
import type { ContentStore } from '../vault/content-store';
import type { GhostWriterResult, Identity } from './types';

export interface GhostWriterInput {
  ensemble: ProviderEnsemble;
  store: ContentStore;
  identity: Identity;
  message: string;
}

/** One reply in the persona's voice, grounded on the transcript tail. */
export async function runGhostWriter(input: GhostWriterInput): Promise<GhostWriterResult> {
  const chatHistory = await input.store.loadChatHistory();
  const result = await input.ensemble.generate({
    prompt: buildGhostWriterPrompt({ currentUser: input.identity.currentUser, message: input.message }),
    systemInstruction: ghostWriterSystemInstruction({
      currentUser: input.identity.currentUser,
      targetPersona: input.identity.targetPersona,
      chatHistory
    })
  });

  return { reply: result.text, provider: result.provider };
}
