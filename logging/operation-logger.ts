export type OperationEventType = 'query' | 'search' | 'count' | 'insert' | 'delete' | 'update' | 'connect' | 'error';

export interface OperationLogEntry {
  timestamp: number;
  model?: string;
  alias?: string;
  eventType: OperationEventType;
  data: Record<string, unknown>;
}

export interface OperationLogger {
  log(entry: OperationLogEntry): void | Promise<void>;
}

export interface RedactionOptions {
  /**
   * Key fragments to redact (case-insensitive partial match), added to the
   * defaults.
   */
  sensitiveFields?: string[];
  /** Numeric arrays longer than this are summarised as `[vector(n)]`. Default: 8. */
  maxVectorPreview?: number;
}

export class ConsoleOperationLogger implements OperationLogger {
  log(entry: OperationLogEntry): void {
    const logLine = JSON.stringify({
      ...entry,
      timestamp: new Date(entry.timestamp).toISOString()
    });
    console.log(`[VECMODEL] ${logLine}`);
  }
}

export class SilentOperationLogger implements OperationLogger {
  log(): void {}
}

const DEFAULT_SENSITIVE_FIELDS = ['password', 'secret', 'token', 'apikey', 'api_key', 'credential', 'authorization'];

/**
 * Redacts sensitive keys and shortens embedding vectors so log lines stay
 * readable. Circular references are replaced with a marker.
 */
export function redactObject(value: unknown, options: RedactionOptions = {}, visited: WeakSet<object> = new WeakSet()): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (visited.has(value)) {
    return '[CIRCULAR]';
  }
  visited.add(value);

  if (Array.isArray(value)) {
    const maxPreview = options.maxVectorPreview ?? 8;
    if (value.length > maxPreview && value.every((item) => typeof item === 'number')) {
      return `[vector(${value.length})]`;
    }
    return value.map((item) => redactObject(item, options, visited));
  }

  const sensitiveFields = [...DEFAULT_SENSITIVE_FIELDS, ...(options.sensitiveFields ?? [])];
  const result: Record<string, unknown> = {};

  for (const [key, nested] of Object.entries(value)) {
    const lowerKey = key.toLowerCase();
    const isSensitive = sensitiveFields.some((pattern) => lowerKey.includes(pattern.toLowerCase()));
    result[key] = isSensitive ? '[REDACTED]' : redactObject(nested, options, visited);
  }

  return result;
}

export class StructuredOperationLogger implements OperationLogger {
  constructor(
    private readonly logger: OperationLogger = new ConsoleOperationLogger(),
    private readonly redactionOptions: RedactionOptions = {}
  ) {}

  async logQuery(params: {
    model: string;
    alias: string;
    kind: 'query' | 'search' | 'count';
    request: Record<string, unknown>;
    rows: number;
    durationMs: number;
  }): Promise<void> {
    await this.log({
      timestamp: Date.now(),
      model: params.model,
      alias: params.alias,
      eventType: params.kind,
      data: {
        request: this.redact(params.request),
        rows: params.rows,
        durationMs: params.durationMs
      }
    });
  }

  async logMutation(params: {
    model: string;
    alias: string;
    kind: 'insert' | 'delete' | 'update';
    collection: string;
    affected: number;
    primaryKeys?: Array<string | number>;
  }): Promise<void> {
    await this.log({
      timestamp: Date.now(),
      model: params.model,
      alias: params.alias,
      eventType: params.kind,
      data: {
        collection: params.collection,
        affected: params.affected,
        primaryKeys: params.primaryKeys
      }
    });
  }

  async logError(params: {
    model?: string;
    alias?: string;
    operation: string;
    error: unknown;
    context?: Record<string, unknown>;
  }): Promise<void> {
    const error = params.error instanceof Error
      ? { name: params.error.name, message: params.error.message }
      : { message: String(params.error) };

    await this.log({
      timestamp: Date.now(),
      model: params.model,
      alias: params.alias,
      eventType: 'error',
      data: {
        operation: params.operation,
        error,
        context: params.context ? this.redact(params.context) : undefined
      }
    });
  }

  async log(entry: OperationLogEntry): Promise<void> {
    // Loggers that ship entries elsewhere return a promise; wait for it
    const result = this.logger.log(entry);
    if (result instanceof Promise) {
      await result;
    }
  }

  private redact(value: Record<string, unknown>): unknown {
    return redactObject(value, this.redactionOptions);
  }
}

export function createDefaultLogger(mode: 'off' | 'console'): StructuredOperationLogger {
  return new StructuredOperationLogger(mode === 'console' ? new ConsoleOperationLogger() : new SilentOperationLogger());
}
