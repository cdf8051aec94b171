export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogRecord = Record<string, unknown> & {
  ts: string;
  level: LogLevel;
  message: string;
};

export type LogSink = (level: LogLevel, payload: string, record: LogRecord) => void;

export type LoggerOptions = {
  level?: LogLevel;
  bindings?: Record<string, unknown>;
  sink?: LogSink;
};

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const consoleSink: LogSink = (level, payload) => {
  switch (level) {
    case 'debug':
      console.debug(payload);
      break;
    case 'warn':
      console.warn(payload);
      break;
    case 'error':
      console.error(payload);
      break;
    default:
      console.info(payload);
  }
};

/**
 * Structured JSON logger. One instance is handed to each component at construction;
 * `child()` binds correlation fields (component, node, container) to every record.
 */
export class LoggerService {
  private readonly level: LogLevel;
  private readonly bindings: Record<string, unknown>;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.bindings = options.bindings ?? {};
    this.sink = options.sink ?? consoleSink;
  }

  child(bindings: Record<string, unknown>): LoggerService {
    return new LoggerService({
      level: this.level,
      bindings: { ...this.bindings, ...bindings },
      sink: this.sink,
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  debug(message: string, ...optionalParams: unknown[]) {
    this.log('debug', message, optionalParams);
  }

  info(message: string, ...optionalParams: unknown[]) {
    this.log('info', message, optionalParams);
  }

  warn(message: string, ...optionalParams: unknown[]) {
    this.log('warn', message, optionalParams);
  }

  error(message: string, ...optionalParams: unknown[]) {
    this.log('error', message, optionalParams);
  }

  private log(level: LogLevel, message: string, optionalParams: unknown[]) {
    if (!this.isLevelEnabled(level)) return;

    const record: LogRecord = {
      ts: new Date().toISOString(),
      level,
      message,
    };

    const bound = this.sanitizeParams([this.bindings])[0];
    if (this.isPlainRecord(bound)) {
      for (const [key, value] of Object.entries(bound)) {
        if (!RESERVED_KEYS.has(key)) record[key] = value;
      }
    }

    if (optionalParams.length > 0) {
      try {
        const context = this.sanitizeParams(optionalParams);
        if (context.length === 1 && this.isPlainRecord(context[0]) && !this.hasReservedKey(context[0])) {
          Object.assign(record, context[0]);
        } else if (context.length > 0) {
          record.context = context;
        }
      } catch (err) {
        record.context = [{ __serialization_error__: this.safeString(err) }];
      }
    }

    let payload: string;
    try {
      payload = JSON.stringify(record);
    } catch {
      payload = JSON.stringify({ ts: record.ts, level, message, context: '[unserializable]' });
    }
    this.sink(level, payload, record);
  }

  private sanitizeParams(params: unknown[]): unknown[] {
    const seen = new WeakSet<object>();

    const redactString = (s: string): string => {
      let out = s.replace(BEARER_RE, 'Bearer [REDACTED]');
      out = out.replace(REDACT_QUERY_PARAM_RE, (_m: string, pfx: string, key: string) => `${pfx}${key}=[REDACTED]`);
      if (out.length > MAX_STRING) {
        const extra = out.length - MAX_STRING;
        out = out.slice(0, MAX_STRING) + `…(+${extra} chars)`;
      }
      return out;
    };

    const toSafe = (v: unknown, depth = 0): unknown => {
      if (v instanceof Error) {
        const safe: Record<string, unknown> = {
          name: v.name,
          message: redactString(String(v.message ?? '')),
          stack: v.stack ? redactString(String(v.stack)) : undefined,
        };
        const cause: unknown = v.cause;
        if (cause !== undefined) {
          if (depth + 1 >= MAX_DEPTH) safe.cause = '[Truncated]';
          else if (cause && typeof cause === 'object') safe.cause = toSafe(cause, depth + 1);
          else safe.cause = redactString(String(cause));
        }
        return safe;
      }
      if (v instanceof Date) return v.toISOString();
      if (v && typeof v === 'object') {
        if (seen.has(v)) return '[Circular]';
        seen.add(v);
        if (depth >= MAX_DEPTH) return '[Truncated]';
        if (Array.isArray(v)) return v.slice(0, MAX_KEYS).map((x: unknown) => toSafe(x, depth + 1));
        const entries = Object.entries(v);
        const out: Record<string, unknown> = {};
        let count = 0;
        for (const [k, val] of entries) {
          if (count++ >= MAX_KEYS) {
            out['__truncated__'] = `[+${entries.length - MAX_KEYS} keys omitted]`;
            break;
          }
          out[k] = REDACT_KEY_RE.test(k) ? '[REDACTED]' : toSafe(val, depth + 1);
        }
        return out;
      }
      if (typeof v === 'bigint') return v.toString();
      if (typeof v === 'string') return redactString(v);
      return v;
    };

    return params.map((p) => toSafe(p, 0));
  }

  private isPlainRecord(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
  }

  private hasReservedKey(obj: Record<string, unknown>): boolean {
    return Object.keys(obj).some((key) => RESERVED_KEYS.has(key));
  }

  private safeString(input: unknown): string {
    try {
      return typeof input === 'string' ? input : JSON.stringify(input);
    } catch {
      return '[unserializable]';
    }
  }
}

const RESERVED_KEYS = new Set(['ts', 'level', 'message']);
const REDACT_KEY_RE = /(authorization|token|accessToken|api[_-]?key|password|secret)/i;
const BEARER_RE = /Bearer\s+[-A-Za-z0-9._~+/:]+=*/gi;
const REDACT_QUERY_PARAM_RE = /([?&])(access_token|token|api[_-]?key|authorization|auth|password|secret)=([^&#]*)/gi;
const MAX_STRING = 2000;
const MAX_DEPTH = 4;
const MAX_KEYS = 100;
