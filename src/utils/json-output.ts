export interface JsonWriteOptions {
  strictJson?: boolean;
}

type OutputStream = Pick<typeof process.stdout, 'write'>;

function safeStringify(value: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(
    value,
    (_key, item: unknown) => {
      if (typeof item === 'bigint') {
        return item.toString();
      }

      if (typeof item === 'object' && item !== null) {
        if (seen.has(item)) {
          return '[Circular]';
        }
        seen.add(item);
      }

      return item;
    },
    2
  );
}

export function stringifyForOutput(value: unknown, options: JsonWriteOptions = {}): string {
  if (options.strictJson) {
    return JSON.stringify(value, null, 2);
  }
  return safeStringify(value);
}

export function printJson(stream: OutputStream, value: unknown, options: JsonWriteOptions = {}): void {
  stream.write(`${stringifyForOutput(value, options)}\n`);
}
