import { z } from 'zod';
import { TransientBackendError, type DeployErrorOptions } from '@dyncluster/deploy-core';

const errorBodySchema = z.object({
  error: z.string().optional(),
  errorType: z.string().optional(),
  message: z.string().optional(),
});

export type ControlPlaneErrorDetails = {
  statusCode: number;
  errorName?: string;
  errorType?: string;
  fullText: string;
  retryable: boolean;
};

/** A control plane call failed; `statusCode` is 0 when no response arrived. */
export class ControlPlaneRequestError extends TransientBackendError {
  readonly errorName?: string;
  readonly errorType?: string;
  readonly fullText: string;
  readonly retryable: boolean;

  constructor(message: string, details: ControlPlaneErrorDetails, options: DeployErrorOptions = {}) {
    super(message, { ...options, statusCode: details.statusCode });
    this.name = 'ControlPlaneRequestError';
    this.errorName = details.errorName;
    this.errorType = details.errorType;
    this.fullText = details.fullText;
    this.retryable = details.retryable;
  }
}

export function isRetryableStatus(status: number): boolean {
  return status === 0 || status === 429 || status >= 500;
}

export function buildErrorFromResponse(status: number, text: string, target: string): ControlPlaneRequestError {
  const parsed = errorBodySchema.safeParse(parseJsonOrUndefined(text));
  const body: z.infer<typeof errorBodySchema> = parsed.success ? parsed.data : {};
  const summary = [body.error, body.message].filter(Boolean).join(': ');
  return new ControlPlaneRequestError(`Control plane ${target} failed (${status})${summary ? `: ${summary}` : ''}`, {
    statusCode: status,
    errorName: body.error,
    errorType: body.errorType,
    fullText: text,
    retryable: isRetryableStatus(status),
  });
}

/** Non-JSON error bodies are kept in `fullText` only. */
function parseJsonOrUndefined(text: string): unknown {
  if (text.trim().length === 0) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
