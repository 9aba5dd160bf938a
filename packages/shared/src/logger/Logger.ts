/**
 * Shared Logger - structured JSON logging for the latency lab services
 *
 * - One JSON object per line, written to the console stream matching the level
 * - Optional append-only file output
 * - Sensitive metadata keys (credentials, bearer tokens) are masked before writing
 */

import { randomUUID } from "crypto";
import * as fs from "fs";
import * as path from "path";

/**
 * Log levels in order of severity
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    FATAL = 4,
}

export type LogMetadata = Record<string, unknown>;

/**
 * Structured log entry
 */
export interface LogEntry {
    timestamp: string;
    level: string;
    message: string;
    component: string;
    correlationId?: string;
    metadata?: LogMetadata;
    error?: {
        name: string;
        message: string;
        stack?: string;
        cause?: string;
    };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    level: LogLevel;
    component: string;
    enableConsole: boolean;
    enableFile: boolean;
    filePath?: string;
    sensitiveFields: string[];
    maxStackTraceLines: number;
}

const MASK = "[MASKED]";

function parseLogLevel(raw: string | undefined): LogLevel {
    switch ((raw ?? "INFO").toUpperCase()) {
        case "DEBUG":
            return LogLevel.DEBUG;
        case "WARN":
            return LogLevel.WARN;
        case "ERROR":
            return LogLevel.ERROR;
        case "FATAL":
            return LogLevel.FATAL;
        default:
            return LogLevel.INFO;
    }
}

export class Logger {
    private config: LoggerConfig;
    private static instances: Map<string, Logger> = new Map();

    constructor(config: LoggerConfig) {
        this.config = config;
    }

    /**
     * Create logger configuration from environment variables
     */
    static createConfigFromEnv(component: string): LoggerConfig {
        return {
            level: parseLogLevel(process.env.LOG_LEVEL),
            component,
            enableConsole: process.env.LOG_ENABLE_CONSOLE !== "false",
            enableFile: process.env.LOG_ENABLE_FILE === "true",
            filePath: process.env.LOG_FILE_PATH,
            sensitiveFields: (process.env.LOG_SENSITIVE_FIELDS ||
                "password,secret,token,authorization").split(",")
                .map((field) => field.trim())
                .filter((field) => field.length > 0),
            maxStackTraceLines: parseInt(
                process.env.LOG_MAX_STACK_LINES || "10",
                10,
            ),
        };
    }

    /**
     * Get or create the logger for a component
     */
    static getInstance(component: string = "shared"): Logger {
        const existing = Logger.instances.get(component);
        if (existing) {
            return existing;
        }
        const logger = new Logger(Logger.createConfigFromEnv(component));
        Logger.instances.set(component, logger);
        return logger;
    }

    /**
     * Drop cached component loggers (tests change LOG_* between cases)
     */
    static resetInstances(): void {
        Logger.instances.clear();
    }

    static generateCorrelationId(): string {
        return randomUUID();
    }

    private isSensitiveKey(key: string): boolean {
        const lowerKey = key.toLowerCase();
        return this.config.sensitiveFields.some((field) =>
            lowerKey.includes(field.toLowerCase())
        );
    }

    private maskSensitiveData(metadata: LogMetadata): LogMetadata {
        const masked: LogMetadata = {};
        for (const [key, inner] of Object.entries(metadata)) {
            masked[key] = this.isSensitiveKey(key)
                ? MASK
                : this.maskValue(inner);
        }
        return masked;
    }

    private maskValue(value: unknown): unknown {
        if (Array.isArray(value)) {
            return value.map((item) => this.maskValue(item));
        }
        if (value !== null && typeof value === "object" && !(value instanceof Error)) {
            return this.maskSensitiveData(Object.fromEntries(Object.entries(value)));
        }
        return value;
    }

    private formatError(error: Error): LogEntry["error"] {
        const stackLines = error.stack?.split("\n").slice(
            0,
            this.config.maxStackTraceLines,
        );
        const formatted: NonNullable<LogEntry["error"]> = {
            name: error.name,
            message: error.message,
            stack: stackLines?.join("\n"),
        };
        if (error.cause instanceof Error) {
            formatted.cause = `${error.cause.name}: ${error.cause.message}`;
        } else if (error.cause !== undefined) {
            formatted.cause = String(error.cause);
        }
        return formatted;
    }

    private createLogEntry(
        level: LogLevel,
        message: string,
        correlationId?: string,
        metadata?: LogMetadata,
        error?: Error,
    ): LogEntry {
        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level: LogLevel[level],
            message,
            component: this.config.component,
        };
        if (correlationId) entry.correlationId = correlationId;
        if (metadata) entry.metadata = this.maskSensitiveData(metadata);
        if (error) entry.error = this.formatError(error);
        return entry;
    }

    private writeLog(entry: LogEntry): void {
        const logString = JSON.stringify(entry);

        if (this.config.enableConsole) {
            switch (entry.level) {
                case "DEBUG":
                    console.debug(logString);
                    break;
                case "INFO":
                    console.info(logString);
                    break;
                case "WARN":
                    console.warn(logString);
                    break;
                default:
                    console.error(logString);
            }
        }

        if (this.config.enableFile && this.config.filePath) {
            try {
                const logDir = path.dirname(this.config.filePath);
                if (!fs.existsSync(logDir)) {
                    fs.mkdirSync(logDir, { recursive: true });
                }
                fs.appendFileSync(this.config.filePath, logString + "\n");
            } catch (error) {
                console.error("Failed to write to log file:", error);
            }
        }
    }

    private shouldLog(level: LogLevel): boolean {
        return level >= this.config.level;
    }

    debug(message: string, correlationId?: string, metadata?: LogMetadata): void {
        if (!this.shouldLog(LogLevel.DEBUG)) return;
        this.writeLog(
            this.createLogEntry(LogLevel.DEBUG, message, correlationId, metadata),
        );
    }

    info(message: string, correlationId?: string, metadata?: LogMetadata): void {
        if (!this.shouldLog(LogLevel.INFO)) return;
        this.writeLog(
            this.createLogEntry(LogLevel.INFO, message, correlationId, metadata),
        );
    }

    warn(message: string, correlationId?: string, metadata?: LogMetadata): void {
        if (!this.shouldLog(LogLevel.WARN)) return;
        this.writeLog(
            this.createLogEntry(LogLevel.WARN, message, correlationId, metadata),
        );
    }

    error(
        message: string,
        error?: Error,
        correlationId?: string,
        metadata?: LogMetadata,
    ): void {
        if (!this.shouldLog(LogLevel.ERROR)) return;
        this.writeLog(
            this.createLogEntry(
                LogLevel.ERROR,
                message,
                correlationId,
                metadata,
                error,
            ),
        );
    }

    fatal(
        message: string,
        error?: Error,
        correlationId?: string,
        metadata?: LogMetadata,
    ): void {
        if (!this.shouldLog(LogLevel.FATAL)) return;
        this.writeLog(
            this.createLogEntry(
                LogLevel.FATAL,
                message,
                correlationId,
                metadata,
                error,
            ),
        );
    }

    getConfig(): LoggerConfig {
        return { ...this.config };
    }

    setLogLevel(level: LogLevel): void {
        this.config.level = level;
    }
}
