import { DeploymentStage } from "./types";

export class DeploymentError extends Error {
  /** Pipeline stage that failed, filled in by the orchestrator when missing */
  stage?: DeploymentStage;
  /** Parameter that guides diagnosis, e.g. the repository or instance name */
  subject?: string;
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DeploymentError";
  }

  withContext(stage: DeploymentStage, subject?: string): this {
    this.stage ??= stage;
    this.subject ??= subject;
    return this;
  }
}

export class ConfigurationError extends DeploymentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export class AuthError extends DeploymentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthError";
  }
}

export class BuildError extends DeploymentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BuildError";
  }
}

export class CryptoError extends DeploymentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CryptoError";
  }
}

export class TransientError extends DeploymentError {
  override readonly retryable = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientError";
  }
}

export class RequestRejectedError extends DeploymentError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RequestRejectedError";
  }
}

export class CancelledError extends DeploymentError {
  constructor(message = "Deployment cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Throw CancelledError if the signal has fired
 */
export function assertNotCancelled(signal: AbortSignal | undefined, what: string): void {
  if (signal?.aborted) {
    throw new CancelledError(`Cancelled before ${what}`);
  }
}
