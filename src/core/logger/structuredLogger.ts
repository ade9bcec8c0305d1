/**
 * Structured Logger - JSON logging for the IAM core
 * Supports log levels and module-scoped child loggers
 */

import { config, LogLevelName } from "../../shared/config";

export type LogLevel = LogLevelName;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  userId?: string;
  tenantId?: string;
  module?: string;
  action?: string;
  metadata?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  level: LogLevel;
  jsonFormat: boolean;
}

export interface LogContext {
  userId?: string;
  tenantId?: string;
  module?: string;
  action?: string;
  metadata?: Record<string, unknown>;
}

type BoundContext = Pick<LogContext, "userId" | "tenantId" | "module">;

type ChildLogContext = Pick<LogContext, "action" | "metadata">;

const LEVEL_VALUES: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

export class StructuredLogger {
  private readonly config: LoggerConfig;
  private static instance: StructuredLogger;

  private constructor(loggerConfig?: Partial<LoggerConfig>) {
    this.config = {
      level: loggerConfig?.level || "INFO",
      jsonFormat: loggerConfig?.jsonFormat ?? true,
    };
  }

  /**
   * Get singleton instance of the structured logger
   */
  static getInstance(loggerConfig?: Partial<LoggerConfig>): StructuredLogger {
    if (!StructuredLogger.instance) {
      StructuredLogger.instance = new StructuredLogger(loggerConfig);
    }
    return StructuredLogger.instance;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_VALUES[level] >= LEVEL_VALUES[this.config.level];
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    context?: LogContext & { error?: Error },
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (context) {
      if (context.userId) entry.userId = context.userId;
      if (context.tenantId) entry.tenantId = context.tenantId;
      if (context.module) entry.module = context.module;
      if (context.action) entry.action = context.action;
      if (context.metadata) entry.metadata = context.metadata;

      if (context.error) {
        entry.error = {
          name: context.error.name,
          message: context.error.message,
          stack: context.error.stack,
        };
      }
    }

    return entry;
  }

  private formatLogEntry(entry: LogEntry): string {
    if (this.config.jsonFormat) {
      return JSON.stringify(entry);
    }

    const { timestamp, level, message, ...rest } = entry;
    const restStr =
      Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : "";
    return `[${timestamp}] ${level}: ${message}${restStr}`;
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog("INFO")) {
      const entry = this.createLogEntry("INFO", message, context);
      console.log(this.formatLogEntry(entry));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog("WARN")) {
      const entry = this.createLogEntry("WARN", message, context);
      console.warn(this.formatLogEntry(entry));
    }
  }

  error(message: string, error?: Error, context?: LogContext): void {
    if (this.shouldLog("ERROR")) {
      const entry = this.createLogEntry("ERROR", message, {
        ...context,
        error,
      });
      console.error(this.formatLogEntry(entry));
    }
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog("DEBUG")) {
      const entry = this.createLogEntry("DEBUG", message, context);
      console.debug(this.formatLogEntry(entry));
    }
  }

  /**
   * Log an authorization decision
   */
  logAuthorization(
    action: string,
    resource: string,
    outcome: "ALLOW" | "DENY",
    details?: {
      userId?: string;
      tenantId?: string;
      reason?: string;
      metadata?: Record<string, unknown>;
    },
  ): void {
    this.debug(`Authorization ${action} on ${resource}: ${outcome}`, {
      userId: details?.userId,
      tenantId: details?.tenantId,
      module: "authorization",
      action,
      metadata: {
        resource,
        outcome,
        reason: details?.reason,
        ...details?.metadata,
      },
    });
  }

  /**
   * Create a child logger with additional context
   */
  child(context: BoundContext): ChildLogger {
    return new ChildLogger(this, context);
  }
}

/**
 * Child logger that automatically includes context in all logs
 */
export class ChildLogger {
  constructor(
    private parent: StructuredLogger,
    private context: BoundContext,
  ) {}

  info(message: string, context?: ChildLogContext): void {
    this.parent.info(message, { ...this.context, ...context });
  }

  warn(message: string, context?: ChildLogContext): void {
    this.parent.warn(message, { ...this.context, ...context });
  }

  error(message: string, error?: Error, context?: ChildLogContext): void {
    this.parent.error(message, error, { ...this.context, ...context });
  }

  debug(message: string, context?: ChildLogContext): void {
    this.parent.debug(message, { ...this.context, ...context });
  }

  child(additionalContext: BoundContext): ChildLogger {
    return new ChildLogger(this.parent, {
      ...this.context,
      ...additionalContext,
    });
  }
}

// Export singleton instance
export const structuredLogger = StructuredLogger.getInstance({
  level: config.logLevel,
  jsonFormat: config.jsonLogFormat,
});
