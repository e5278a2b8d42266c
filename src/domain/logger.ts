/**
 * Structured JSON logger for the weather proxy and agent
 *
 * IMPORTANT: All logs go to stderr because stdout is reserved for MCP stdio communication
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

const REDACTED = '[REDACTED]';

class Logger {
  private minLevel: LogLevel;
  private readonly secrets = new Set<string>();
  private readonly levelPriority: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(minLevel: LogLevel = 'info') {
    this.minLevel = minLevel;
  }

  /**
   * Set the minimum log level
   */
  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /**
   * Register a value (API key, token) that must never be written out.
   * Every occurrence in a log line is replaced by [REDACTED].
   */
  registerSecret(value: string | undefined): void {
    if (value && value.length > 0) {
      this.secrets.add(value);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levelPriority[level] >= this.levelPriority[this.minLevel];
  }

  private redact(line: string): string {
    let result = line;
    for (const secret of this.secrets) {
      result = result.split(secret).join(REDACTED);
      // Secrets also travel URL-encoded inside query strings
      const encoded = encodeURIComponent(secret);
      if (encoded !== secret) {
        result = result.split(encoded).join(REDACTED);
      }
    }
    return result;
  }

  /**
   * Write a log entry to stderr
   */
  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
    };

    console.error(this.redact(JSON.stringify(entry)));
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  /**
   * Log an error object with stack trace
   */
  logError(error: Error, context?: LogContext): void {
    this.error(error.message, {
      ...context,
      errorName: error.name,
      stack: error.stack,
    });
  }

  /**
   * Log an incoming HTTP request
   */
  logRequest(
    method: string,
    path: string,
    query: Record<string, unknown>,
    requestId?: string
  ): void {
    this.info('Incoming request', {
      requestId,
      method,
      path,
      query: this.sanitizeInput(query),
    });
  }

  logToolStart(toolName: string, input: unknown, requestId?: string): void {
    this.info('Tool call started', {
      requestId,
      toolName,
      inputSummary: this.sanitizeInput(input),
    });
  }

  logToolEnd(
    toolName: string,
    latencyMs: number,
    outcome: 'success' | 'error',
    requestId?: string,
    errorCode?: string
  ): void {
    this.info('Tool call completed', {
      requestId,
      toolName,
      latencyMs,
      outcome,
      ...(errorCode && { errorCode }),
    });
  }

  /**
   * Log an outbound call to the weather provider.
   * The access key is stripped from the URL before it is written.
   */
  logUpstreamCall(
    upstreamUrl: string,
    upstreamStatus: number,
    latencyMs: number,
    requestId?: string
  ): void {
    this.debug('Upstream API call', {
      requestId,
      upstreamUrl: redactUrl(upstreamUrl),
      upstreamStatus,
      latencyMs,
    });
  }

  /**
   * Only log safe summary fields of caller input
   */
  private sanitizeInput(input: unknown): Record<string, unknown> {
    if (typeof input !== 'object' || input === null) {
      return { type: typeof input };
    }

    const summary: Record<string, unknown> = {};
    const safeFields = ['location', 'query'];

    for (const field of safeFields) {
      if (field in input) {
        summary[field] = Reflect.get(input, field);
      }
    }

    return summary;
  }
}

/**
 * Replace the value of every credential-bearing query parameter in a URL
 */
export function redactUrl(url: string): string {
  return url.replace(/([?&](?:access_key|api[-_]?key|key)=)[^&#]*/gi, `$1${REDACTED}`);
}

// Singleton logger instance
const logger = new Logger();

export { logger, Logger };
