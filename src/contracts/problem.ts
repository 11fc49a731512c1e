import {
  AssetAbsentError,
  DecryptionError,
  GateRejectedError,
  ProviderCallError,
  VaultConfigError,
  VaultError,
  VaultStateError,
  errorMessage
} from '../errors';

export interface ProblemDetails {
  type: string;
  title: string;
  status?: number;
  detail: string;
  instance?: string;
  vaultCode: string;
  retriable: boolean;
}

export function toProblemDetails(error: unknown, instance?: string): ProblemDetails {
  if (error instanceof ProviderCallError) {
    return {
      type: 'urn:memory-vault:problem:provider-call-failed',
      title: `Provider ${error.provider} failed`,
      status: error.status,
      detail: error.message,
      instance,
      vaultCode: error.code,
      retriable: error.status === undefined || error.status >= 500
    };
  }

  if (error instanceof GateRejectedError) {
    const throttled = error.code === 'VAULT_THROTTLED';
    return {
      type: throttled ? 'urn:memory-vault:problem:throttled' : 'urn:memory-vault:problem:access-denied',
      title: throttled ? 'Too many requests' : 'Access denied',
      status: throttled ? 429 : 403,
      detail: error.message,
      instance,
      vaultCode: error.code,
      retriable: throttled
    };
  }

  if (error instanceof AssetAbsentError) {
    return {
      type: 'urn:memory-vault:problem:asset-absent',
      title: 'Asset missing',
      status: 404,
      detail: error.message,
      instance: instance ?? error.path,
      vaultCode: error.code,
      retriable: false
    };
  }

  if (error instanceof DecryptionError) {
    return {
      type: 'urn:memory-vault:problem:decryption-failed',
      title: 'Vault asset could not be decrypted',
      status: 422,
      detail: error.message,
      instance,
      vaultCode: error.code,
      retriable: false
    };
  }

  if (error instanceof VaultStateError || error instanceof VaultConfigError) {
    return {
      type: 'urn:memory-vault:problem:invalid-request',
      title: 'Invalid request',
      status: 400,
      detail: error.message,
      instance,
      vaultCode: error.code,
      retriable: false
    };
  }

  if (error instanceof VaultError) {
    return {
      type: 'about:blank',
      title: 'Vault error',
      status: 500,
      detail: error.message,
      instance,
      vaultCode: error.code,
      retriable: false
    };
  }

  return {
    type: 'about:blank',
    title: 'Unhandled error',
    status: 500,
    detail: errorMessage(error),
    instance,
    vaultCode: 'VAULT_UNHANDLED_ERROR',
    retriable: false
  };
}
