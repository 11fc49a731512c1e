export class VaultError extends Error {
  readonly code: string;

  constructor(message: string, code = 'VAULT_ERROR') {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
  }
}

export class GateRejectedError extends VaultError {
  readonly reason: 'automation' | 'rate-limited' | 'no-match' | 'empty';

  constructor(reason: GateRejectedError['reason'], message: string) {
    super(message, reason === 'no-match' || reason === 'empty' ? 'VAULT_ACCESS_DENIED' : 'VAULT_THROTTLED');
    this.reason = reason;
  }
}

export class AssetAbsentError extends VaultError {
  readonly path: string;

  constructor(path: string) {
    super(`Asset missing: ${path}`, 'VAULT_ASSET_ABSENT');
    this.path = path;
  }
}

export class ProviderCallError extends VaultError {
  readonly provider: string;
  readonly status?: number;
  readonly details?: unknown;

  constructor(args: { provider: string; message: string; status?: number; details?: unknown }) {
    super(args.message, 'VAULT_PROVIDER_CALL_FAILED');
    this.provider = args.provider;
    this.status = args.status;
    this.details = args.details;
  }
}

export class DecryptionError extends VaultError {
  constructor(message: string) {
    super(message, 'VAULT_DECRYPTION_FAILED');
  }
}

export class VaultStateError extends VaultError {
  constructor(message: string) {
    super(message, 'VAULT_STATE_ERROR');
  }
}

export class VaultConfigError extends VaultError {
  constructor(message: string) {
    super(message, 'VAULT_CONFIG_ERROR');
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
