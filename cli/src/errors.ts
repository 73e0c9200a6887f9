export type CatalogErrorKind =
  | 'unsupported_platform'
  | 'probe_unavailable'
  | 'probe_timeout'
  | 'duplicate_record'
  | 'permission_denied'
  | 'unknown_failure';

export class CatalogError extends Error {
  readonly kind: CatalogErrorKind;
  constructor(kind: CatalogErrorKind, message: string) {
    super(message);
    this.name = 'CatalogError';
    this.kind = kind;
  }
}

export class UnsupportedPlatformError extends CatalogError {
  platform: string;
  constructor(platform: string) {
    super('unsupported_platform', `Unsupported operating system: ${platform}`);
    this.name = 'UnsupportedPlatformError';
    this.platform = platform;
  }
}

export class ProbeUnavailableError extends CatalogError {
  constructor(message: string) {
    super('probe_unavailable', message);
    this.name = 'ProbeUnavailableError';
  }
}

export class ProbeTimeoutError extends CatalogError {
  timeoutMs: number;
  constructor(probe: string, timeoutMs: number) {
    super('probe_timeout', `${probe} did not finish within ${timeoutMs}ms`);
    this.name = 'ProbeTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class DuplicateRecordError extends CatalogError {
  macAddress: string;
  constructor(macAddress: string) {
    super('duplicate_record', `A record for ${macAddress} already exists`);
    this.name = 'DuplicateRecordError';
    this.macAddress = macAddress;
  }
}

export class PermissionDeniedError extends CatalogError {
  path: string;
  constructor(path: string) {
    super('permission_denied', `You do not have the permission to read or write this file: ${path}`);
    this.name = 'PermissionDeniedError';
    this.path = path;
  }
}

export class UnknownFailureError extends CatalogError {
  constructor(cause: unknown) {
    super('unknown_failure', cause instanceof Error ? cause.message : String(cause));
    this.name = 'UnknownFailureError';
    this.cause = cause;
  }
}

export function toCatalogError(err: unknown): CatalogError {
  return err instanceof CatalogError ? err : new UnknownFailureError(err);
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}
