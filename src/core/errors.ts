/**
 * Error taxonomy shared by the server and the discovery agent
 */

export type FieldErrors = Record<string, string>;

/**
 * Rejected submission. Recoverable by the submitter; no job is created.
 */
export class ValidationError extends Error {
  constructor(public readonly fieldErrors: FieldErrors) {
    super(
      `Invalid configuration: ${Object.entries(fieldErrors)
        .map(([field, message]) => `${field}: ${message}`)
        .join('; ')}`
    );
    this.name = 'ValidationError';
  }
}

export type BuildStage = 'render' | 'store' | 'image' | 'finalize' | 'cancelled' | 'watchdog';

/**
 * Raised inside a build. Fails the job; retries are new jobs.
 */
export class BuildError extends Error {
  constructor(public readonly stage: BuildStage, message: string) {
    super(message);
    this.name = 'BuildError';
  }
}

/**
 * Too many live jobs to accept another one
 */
export class CapacityError extends Error {
  constructor(public readonly limit: number) {
    super('Maximum number of concurrent jobs reached.');
    this.name = 'CapacityError';
  }
}

export type DiscoveryErrorCode =
  | 'disk-not-found'
  | 'nic-not-found'
  | 'mac-not-found'
  | 'network-bring-up-failed'
  | 'callback-failed';

/**
 * Fatal to the boot-time installation
 */
export class DiscoveryError extends Error {
  constructor(public readonly code: DiscoveryErrorCode, message: string) {
    super(message);
    this.name = 'DiscoveryError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
