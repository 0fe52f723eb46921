export class CostwiseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CostwiseError';
  }
}

export type TransportComponent = 'tool_client' | 'model';

/** The tool transport or the model endpoint failed to start or to answer. */
export class TransportError extends CostwiseError {
  constructor(
    public readonly component: TransportComponent,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(`Transport failure (${component}): ${message}`);
    this.name = 'TransportError';
  }
}

/** A resume or stop was requested for an interruption that is already resolved. */
export class StaleInterruptionError extends CostwiseError {
  constructor(public readonly interruptionId: string) {
    super(`Interruption already resolved: ${interruptionId}`);
    this.name = 'StaleInterruptionError';
  }
}

export class ToolNotFoundError extends CostwiseError {
  constructor(public readonly toolName: string) {
    super(`Tool not found: ${toolName}`);
    this.name = 'ToolNotFoundError';
  }
}

export class ProviderNotAvailableError extends CostwiseError {
  constructor(public readonly providerName: string) {
    super(`Provider not available: ${providerName}`);
    this.name = 'ProviderNotAvailableError';
  }
}

export class ConfigError extends CostwiseError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
