export type CliErrorFormat = 'text' | 'json';

function isCliErrorFormat(value: string | undefined): value is CliErrorFormat {
  return value === 'text' || value === 'json';
}

/**
 * Finds `--error-format` before commander has parsed argv, so the bin entry can
 * format failures that happen during parsing. Scanning stops at `--`.
 */
export function parseErrorFormatArg(argv: string[]): CliErrorFormat | undefined {
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === '--') {
      return undefined;
    }

    if (arg === '--error-format') {
      const next = argv[index + 1];
      if (isCliErrorFormat(next)) {
        return next;
      }
      continue;
    }

    if (arg.startsWith('--error-format=')) {
      const value = arg.slice('--error-format='.length);
      if (isCliErrorFormat(value)) {
        return value;
      }
    }
  }

  return undefined;
}

export function resolveCliErrorFormat(argv: string[], envValue?: string): CliErrorFormat {
  return parseErrorFormatArg(argv) ?? (envValue === 'json' ? 'json' : 'text');
}
