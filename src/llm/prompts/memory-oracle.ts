import type { MemoryEntry } from '../../vault/content-store';

export function buildMemoryOraclePrompt(input: {
  currentUser: string;
  targetPersona: string;
  mood: string;
  memories: MemoryEntry[];
}): string {
  return [
    "You are the magical curator of a couple's love story.",
    `User (${input.currentUser}) is feeling: '${input.mood}'.`,
    `Target Persona (Author of message): ${input.targetPersona}.`,
    '',
    'Here are the available memories:',
    JSON.stringify(input.memories),
    '',
    'Task:',
    `1. Analyze the user's mood ('${input.mood}') deeply.`,
    '2. Select the ONE memory from the provided list that BEST resonates with this mood. Do NOT just pick the first one.',
    '3. Write a short, poetic, loving message.',
    '',
    'Return STRICT JSON format:',
    '{"reasoning": "Why I chose this memory for this mood...", "file_path": "assets/Filename.ext", "poetic_message": "Your message here..."}'
  ].join('\n');
}
