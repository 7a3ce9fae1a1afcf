/**
 * Request log for tool calls.
 *
 * Each call becomes one entry in a bounded in-memory ring and one line on
 * stderr. Parameters are redacted before they are stored.
 */

export interface LogEntry {
  timestamp: Date;
  toolName: string;
  operation: string;
  principal?: string;
  parameters: Record<string, unknown>;
  success: boolean;
  duration?: number;
  error?: string;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerConfig {
  enabled: boolean;
  logLevel: LogLevel;
  maxLogEntries: number;
  sanitizeParameters: boolean;
}

export interface LogFilter {
  toolName?: string;
  success?: boolean;
  since?: Date;
  limit?: number;
}

export interface LogStats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  averageDuration: number;
  toolUsage: Record<string, number>;
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

// Matched as substrings of the lower-cased parameter name
const SENSITIVE_KEY_FRAGMENTS = [
  'token',
  'password',
  'secret',
  'authorization',
  'credential',
  'api_key',
] as const;

const REDACTED = '***';

function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
}

function isSensitiveKey(key: string): boolean {
  const lowered = key.toLowerCase();
  return SENSITIVE_KEY_FRAGMENTS.some((fragment) => lowered.includes(fragment));
}

function redactString(value: string): string {
  return value
    .replace(/[a-zA-Z0-9]{40,}/g, REDACTED)
    .replace(/Bearer\s+[a-zA-Z0-9_-]+/gi, `Bearer ${REDACTED}`)
    .replace(/token[s]?[:\s=]+[a-zA-Z0-9_-]+/gi, `token=${REDACTED}`);
}

function redactValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return redactString(value);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactValue(item));
  }
  if (typeof value === 'object' && value !== null) {
    return redactRecord(Object.entries(value));
  }
  return value;
}

function redactRecord(entries: [string, unknown][]): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of entries) {
    redacted[key] = isSensitiveKey(key) ? REDACTED : redactValue(value);
  }
  return redacted;
}

function describeEntry(entry: LogEntry): string {
  const parts = [`${entry.toolName}:${entry.operation}`, entry.success ? 'SUCCESS' : 'FAILED'];
  if (entry.duration !== undefined) {
    parts.push(`${entry.duration}ms`);
  }
  if (entry.principal !== undefined) {
    parts.push(`principal:${entry.principal}`);
  }
  if (entry.error) {
    parts.push(`error:"${entry.error}"`);
  }
  return parts.join(' | ');
}

export class RequestLogger {
  private entries: LogEntry[] = [];
  private readonly config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      enabled: process.env['NODE_ENV'] !== 'production',
      logLevel: parseLogLevel(process.env['LOG_LEVEL']),
      maxLogEntries: 1000,
      sanitizeParameters: true,
      ...config,
    };
  }

  logRequest(
    toolName: string,
    operation: string,
    parameters: Record<string, unknown>,
    success: boolean,
    duration?: number,
    error?: string,
    principal?: string,
  ): void {
    if (!this.config.enabled) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      toolName,
      operation,
      parameters: this.config.sanitizeParameters
        ? redactRecord(Object.entries(parameters))
        : parameters,
      success,
      ...(principal !== undefined && { principal }),
      ...(duration !== undefined && { duration }),
      ...(error && { error: redactString(error) }),
    };

    this.entries.push(entry);
    if (this.entries.length > this.config.maxLogEntries) {
      this.entries.shift();
    }

    this.write(entry);
  }

  logSuccess(
    toolName: string,
    operation: string,
    parameters: Record<string, unknown>,
    duration?: number,
    principal?: string,
  ): void {
    this.logRequest(toolName, operation, parameters, true, duration, undefined, principal);
  }

  logError(
    toolName: string,
    operation: string,
    parameters: Record<string, unknown>,
    error: string,
    duration?: number,
    principal?: string,
  ): void {
    this.logRequest(toolName, operation, parameters, false, duration, error, principal);
  }

  /**
   * Newest entries, oldest first
   */
  getRecentLogs(count: number = 50): LogEntry[] {
    return count <= 0 ? [] : this.entries.slice(-count);
  }

  getFilteredLogs(filter: LogFilter): LogEntry[] {
    const { toolName, success, since, limit } = filter;
    const matching = this.entries.filter(
      (entry) =>
        (toolName === undefined || entry.toolName === toolName) &&
        (success === undefined || entry.success === success) &&
        (since === undefined || entry.timestamp >= since),
    );
    return limit ? matching.slice(-limit) : matching;
  }

  clearLogs(): void {
    this.entries = [];
  }

  getStats(): LogStats {
    const toolUsage: Record<string, number> = {};
    let successfulRequests = 0;
    let durationTotal = 0;
    let timedRequests = 0;

    for (const entry of this.entries) {
      toolUsage[entry.toolName] = (toolUsage[entry.toolName] ?? 0) + 1;
      if (entry.success) {
        successfulRequests += 1;
      }
      if (entry.duration !== undefined) {
        durationTotal += entry.duration;
        timedRequests += 1;
      }
    }

    return {
      totalRequests: this.entries.length,
      successfulRequests,
      failedRequests: this.entries.length - successfulRequests,
      averageDuration: timedRequests > 0 ? durationTotal / timedRequests : 0,
      toolUsage,
    };
  }

  private write(entry: LogEntry): void {
    if (entry.success) {
      if (this.shouldLog('info')) {
        console.error(`[INFO] ${describeEntry(entry)}`);
      }
    } else if (this.shouldLog('error')) {
      console.error(`[ERROR] ${describeEntry(entry)}`);
    }

    if (this.shouldLog('debug')) {
      const params = JSON.stringify(entry.parameters, (_key, value: unknown) =>
        typeof value === 'bigint' ? value.toString() : value,
      );
      console.error(`[DEBUG] ${entry.toolName}:${entry.operation} params ${params}`);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.config.logLevel);
  }
}

export const globalRequestLogger = new RequestLogger();
