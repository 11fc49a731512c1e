import { createInterface } from 'node:readline';

export interface LinePrompter {
  /** Resolves undefined once input is exhausted. */
  ask(question: string): Promise<string | undefined>;
  close(): void;
}

export function createLinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: Pick<typeof process.stdout, 'write'> = process.stdout
): LinePrompter {
  const rl = createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async ask(question: string): Promise<string | undefined> {
      output.write(question);
      const next = await lines.next();
      return next.done ? undefined : next.value;
    },
    close() {
      rl.close();
    }
  };
}

/** Serves canned answers; used for scripted sessions. */
export function createScriptedPrompter(answers: string[]): LinePrompter {
  const queue = [...answers];
  return {
    async ask(): Promise<string | undefined> {
      return queue.shift();
    },
    close() {
      queue.length = 0;
    }
  };
}
