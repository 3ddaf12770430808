/**
 * Error types
 */

export class PrewarmError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised when two tags of different kinds (or distinct alias/unknown tags)
 * are compared.
 */
export class IncomparableTagError extends PrewarmError {
  constructor(readonly left: string, readonly right: string, reason: string) {
    super(`Cannot compare tags "${left}" and "${right}": ${reason}`);
  }
}

export class MalformedImageGroupError extends PrewarmError {
  constructor(readonly names: readonly string[], reason: string) {
    super(`Malformed image group [${names.join(', ')}]: ${reason}`);
  }
}

export class PullJobNotFoundError extends PrewarmError {
  constructor(readonly jobName: string) {
    super(`Pull job ${jobName} not found`);
  }
}

export class RegistryError extends PrewarmError {
  constructor(message: string, readonly statusCode?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ClusterError extends PrewarmError {
  constructor(message: string, readonly statusCode?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ValidationError extends PrewarmError {
  constructor(message: string, readonly details?: string) {
    super(message);
  }
}

export class TargetNotFoundError extends PrewarmError {
  constructor(readonly targetName: string) {
    super(`Target ${targetName} not found`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
