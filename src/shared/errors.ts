export class TubewatchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'TubewatchError';
  }
}

export class ConfigError extends TubewatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export type RegistryErrorKind = 'StorageUnavailable' | 'StorageCorrupt' | 'NotFound' | 'WriteFailed';

export class RegistryError extends TubewatchError {
  constructor(
    public readonly kind: RegistryErrorKind,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message, 'REGISTRY_ERROR', details);
    this.name = 'RegistryError';
  }
}

export type FetchErrorKind = 'NotFound' | 'NoItems' | 'Transient' | 'Unauthorized';

export class FetchError extends TubewatchError {
  constructor(
    public readonly kind: FetchErrorKind,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message, 'FETCH_ERROR', details);
    this.name = 'FetchError';
  }
}

export type SendErrorKind = 'AuthFailed' | 'TransportFailed';

export class SendError extends TubewatchError {
  constructor(
    public readonly kind: SendErrorKind,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message, 'SEND_ERROR', details);
    this.name = 'SendError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
