import crypto from 'node:crypto';
import { ConfigurationError } from '@dyncluster/deploy-core';

/** Username and password exchanged for a short-lived session token via `POST /sessions`. */
export type BasicCredentials = {
  kind: 'basic';
  username: string;
  password: string;
};

/** API key pair; every request carries its own timestamped HMAC. */
export type TokenCredentials = {
  kind: 'token';
  accessKey: string;
  secretKey: string;
};

export type ControlPlaneCredentials = BasicCredentials | TokenCredentials;

export type SignableRequest = {
  method: string;
  /** Path including the query string, exactly as sent. */
  path: string;
};

export type SigningContext = {
  /** Current session token; required for basic credentials. */
  sessionToken?: string;
  now?: () => number;
};

export const HEADER_TIMESTAMP = 'couchbase-timestamp';

export function basicAuthorization(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}

export function buildSignaturePayload(parts: { method: string; path: string; timestamp: string }): string {
  return `${parts.method.toUpperCase()}\n${parts.path}\n${parts.timestamp}`;
}

/**
 * Authorization headers for one request.
 *
 * The key-pair scheme signs `METHOD\nPATH\nUNIX_SECONDS` with HMAC-SHA256 and sends
 * `Bearer <accessKey>:<base64 signature>` next to the timestamp header. That format has not
 * been checked against a live control plane.
 */
export function signRequest(
  credentials: ControlPlaneCredentials,
  request: SignableRequest,
  context: SigningContext = {},
): Record<string, string> {
  switch (credentials.kind) {
    case 'basic': {
      if (!context.sessionToken) {
        throw new ConfigurationError('Basic credentials need a session token before requests can be signed');
      }
      return { authorization: `Bearer ${context.sessionToken}` };
    }
    case 'token': {
      const timestamp = Math.floor((context.now ?? Date.now)() / 1000).toString();
      const signature = crypto
        .createHmac('sha256', credentials.secretKey)
        .update(buildSignaturePayload({ method: request.method, path: request.path, timestamp }))
        .digest('base64');
      return {
        [HEADER_TIMESTAMP]: timestamp,
        authorization: `Bearer ${credentials.accessKey}:${signature}`,
      };
    }
  }
}
