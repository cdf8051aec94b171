export type DeployErrorCode =
  | 'configuration_error'
  | 'resource_not_found'
  | 'tool_missing'
  | 'transient_backend_error'
  | 'consistency_error'
  | 'cancelled';

export type DeployErrorOptions = {
  resourceId?: string;
  cause?: unknown;
};

export class DeployError extends Error {
  public readonly resourceId?: string;

  constructor(
    public readonly code: DeployErrorCode,
    message: string,
    options: DeployErrorOptions = {},
  ) {
    super(options.resourceId ? `${message} (resource=${options.resourceId})` : message, { cause: options.cause });
    this.name = 'DeployError';
    this.resourceId = options.resourceId;
  }
}

/** Network addressing of the shared network is missing or ambiguous. */
export class ConfigurationError extends DeployError {
  constructor(message: string, options?: DeployErrorOptions) {
    super('configuration_error', message, options);
    this.name = 'ConfigurationError';
  }
}

export class ResourceNotFoundError extends DeployError {
  constructor(message: string, options?: DeployErrorOptions) {
    super('resource_not_found', message, options);
    this.name = 'ResourceNotFoundError';
  }
}

export class ToolMissingError extends DeployError {
  constructor(
    public readonly tool: string,
    options?: DeployErrorOptions,
  ) {
    super('tool_missing', `Tool '${tool}' is not available`, options);
    this.name = 'ToolMissingError';
  }
}

/** A single backend call failed. Not retried at this layer. */
export class TransientBackendError extends DeployError {
  public readonly statusCode?: number;

  constructor(message: string, options?: DeployErrorOptions & { statusCode?: number }) {
    super('transient_backend_error', message, options);
    this.name = 'TransientBackendError';
    this.statusCode = options?.statusCode;
  }
}

export class ConsistencyError extends DeployError {
  constructor(message: string, options?: DeployErrorOptions) {
    super('consistency_error', message, options);
    this.name = 'ConsistencyError';
  }
}

export type CancellationReason = 'aborted' | 'timeout';

export class CancellationError extends DeployError {
  constructor(
    public readonly reason: CancellationReason,
    message: string,
    options?: DeployErrorOptions,
  ) {
    super('cancelled', message, options);
    this.name = 'CancellationError';
  }
}

export function isDeployError(err: unknown, code?: DeployErrorCode): err is DeployError {
  if (!(err instanceof DeployError)) return false;
  return code === undefined || err.code === code;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === 'string' ? err : String(err);
}
