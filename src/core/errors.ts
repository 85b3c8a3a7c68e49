/**
 * Error types raised during an export run and their process exit codes
 */

export class ExportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Missing or malformed flags, environment or config file
 */
export class ConfigurationError extends ExportError {}

/**
 * CA bundle could not be read or holds no usable certificate
 */
export class CertificateAuthorityError extends ExportError {}

export class BadHttpStatusError extends ExportError {
  constructor(readonly statusCode: number) {
    super(`HTTP ${statusCode}`);
  }
}

export class ResponseDecodeError extends ExportError {}

export class BundleWriteError extends ExportError {}

export const EXIT_SUCCESS = 0;
export const EXIT_RUNTIME_ERROR = 1;
export const EXIT_CONFIGURATION_ERROR = 2;

export function exitCodeFor(error: unknown): number {
  return error instanceof ConfigurationError ? EXIT_CONFIGURATION_ERROR : EXIT_RUNTIME_ERROR;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
