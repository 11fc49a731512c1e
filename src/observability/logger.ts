import pino, { type Logger } from 'pino';

function resolveLevel(): string {
  return process.env.MEMORY_VAULT_LOG_LEVEL?.trim() || 'silent';
}

let singleton: Logger | undefined;

export function getLogger(): Logger {
  if (!singleton) {
    singleton = pino({
      name: 'memory-vault',
      level: resolveLevel()
    });
  }
  return singleton;
}
