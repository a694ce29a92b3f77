export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_NOT_FOUND = 1;
export const EXIT_CODE_USAGE = 2;
export const EXIT_CODE_RUNTIME = 3;
export const EXIT_CODE_AUTHENTICATION = 4;

export type SecretStoreErrorCode = 'NOT_FOUND' | 'INVALID_ARGS' | 'KEY_IO' | 'DATA_IO' | 'FORMAT' | 'AUTHENTICATION';

export class SecretStoreError extends Error {
  readonly code: SecretStoreErrorCode;
  readonly details?: unknown;

  constructor(code: SecretStoreErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class NotFoundError extends SecretStoreError {
  readonly service: string;

  constructor(service: string) {
    super('NOT_FOUND', `No secret stored for ${service}.`);
    this.service = service;
  }
}

export class UsageError extends SecretStoreError {
  constructor(message: string) {
    super('INVALID_ARGS', message);
  }
}

export class KeyIOError extends SecretStoreError {
  constructor(message: string, details?: unknown) {
    super('KEY_IO', message, details);
  }
}

export class DataIOError extends SecretStoreError {
  constructor(message: string, details?: unknown) {
    super('DATA_IO', message, details);
  }
}

export class FormatError extends SecretStoreError {
  constructor(message: string, details?: unknown) {
    super('FORMAT', message, details);
  }
}

/** Tag verification failed: the record was tampered with or sealed under another key. */
export class AuthenticationError extends SecretStoreError {
  constructor(message = 'Secret could not be decrypted: wrong master key or tampered record.') {
    super('AUTHENTICATION', message);
  }
}

export function toExitCode(error: unknown): number {
  if (error instanceof SecretStoreError) {
    if (error.code === 'NOT_FOUND') return EXIT_CODE_NOT_FOUND;
    if (error.code === 'INVALID_ARGS') return EXIT_CODE_USAGE;
    if (error.code === 'AUTHENTICATION') return EXIT_CODE_AUTHENTICATION;
    return EXIT_CODE_RUNTIME;
  }
  return EXIT_CODE_RUNTIME;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
