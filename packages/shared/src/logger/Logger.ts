/**
 * Shared Logger - structured JSON logging for Market Pulse services
 *
 * Every entry is a single JSON line carrying the component name, an optional
 * correlation id and masked metadata. Output goes to the console (routed by
 * level) and optionally to a file.
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
    correlationId?: string;
    component?: string;
    operation?: string;
    duration?: number;
    metadata?: LogMetadata;
    error?: {
        name: string;
        message: string;
        stack?: string;
        code?: string | number;
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
    enablePerformanceLogging: boolean;
    sensitiveFields: string[];
    maxStackTraceLines: number;
}

/**
 * Performance timer for operation tracking
 */
export interface PerformanceTimer {
    operation: string;
    startTime: number;
    correlationId?: string;
    metadata?: LogMetadata;
}

const LEVEL_NAMES: Record<string, LogLevel> = {
    DEBUG: LogLevel.DEBUG,
    INFO: LogLevel.INFO,
    WARN: LogLevel.WARN,
    ERROR: LogLevel.ERROR,
    FATAL: LogLevel.FATAL,
};

function parseLogLevel(value: string | undefined): LogLevel {
    if (!value) return LogLevel.INFO;
    return LEVEL_NAMES[value.toUpperCase()] ?? LogLevel.INFO;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null;
}

export class Logger {
    private config: LoggerConfig;
    private static instance: Logger | null = null;
    private activeTimers: Map<string, PerformanceTimer> = new Map();

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
            enablePerformanceLogging:
                process.env.LOG_ENABLE_PERFORMANCE !== "false",
            sensitiveFields: (process.env.LOG_SENSITIVE_FIELDS ||
                "password,secret,token,apikey,authorization").split(",")
                .map((field) => field.trim())
                .filter((field) => field.length > 0),
            maxStackTraceLines: parseInt(
                process.env.LOG_MAX_STACK_LINES || "10",
                10,
            ),
        };
    }

    /**
     * Get or create singleton logger instance
     */
    static getInstance(component: string = "market-pulse"): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger(Logger.createConfigFromEnv(component));
        }
        return Logger.instance;
    }

    /**
     * Drop the singleton so the next getInstance re-reads the environment
     */
    static resetInstance(): void {
        Logger.instance = null;
    }

    static generateCorrelationId(): string {
        return randomUUID();
    }

    /**
     * Logger sharing this logger's settings under another component name
     */
    child(component: string): Logger {
        return new Logger({ ...this.config, component });
    }

    private isSensitiveKey(key: string): boolean {
        const lowerKey = key.toLowerCase();
        return this.config.sensitiveFields.some((field) =>
            lowerKey.includes(field.toLowerCase())
        );
    }

    private maskSensitiveData(value: unknown): unknown {
        if (value === null || value === undefined) return value;
        if (Array.isArray(value)) {
            return value.map((item) => this.maskSensitiveData(item));
        }
        if (value instanceof Date) return value.toISOString();
        if (isRecord(value)) {
            const masked: Record<string, unknown> = {};
            for (const [key, nested] of Object.entries(value)) {
                masked[key] = this.isSensitiveKey(key)
                    ? "[MASKED]"
                    : this.maskSensitiveData(nested);
            }
            return masked;
        }
        return value;
    }

    private maskMetadata(metadata: LogMetadata): LogMetadata {
        const masked: LogMetadata = {};
        for (const [key, value] of Object.entries(metadata)) {
            masked[key] = this.isSensitiveKey(key)
                ? "[MASKED]"
                : this.maskSensitiveData(value);
        }
        return masked;
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
        if ("code" in error) {
            const code = error.code;
            if (typeof code === "string" || typeof code === "number") {
                formatted.code = code;
            }
        }
        return formatted;
    }

    private createLogEntry(
        level: LogLevel,
        message: string,
        correlationId?: string,
        operation?: string,
        duration?: number,
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
        if (operation) entry.operation = operation;
        if (duration !== undefined) entry.duration = duration;
        if (metadata) entry.metadata = this.maskMetadata(metadata);
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
                case "ERROR":
                case "FATAL":
                    console.error(logString);
                    break;
                default:
                    console.log(logString);
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

    private log(
        level: LogLevel,
        message: string,
        correlationId?: string,
        metadata?: LogMetadata,
        error?: Error,
    ): void {
        if (!this.shouldLog(level)) return;
        this.writeLog(
            this.createLogEntry(
                level,
                message,
                correlationId,
                undefined,
                undefined,
                metadata,
                error,
            ),
        );
    }

    debug(message: string, correlationId?: string, metadata?: LogMetadata): void {
        this.log(LogLevel.DEBUG, message, correlationId, metadata);
    }

    info(message: string, correlationId?: string, metadata?: LogMetadata): void {
        this.log(LogLevel.INFO, message, correlationId, metadata);
    }

    warn(message: string, correlationId?: string, metadata?: LogMetadata): void {
        this.log(LogLevel.WARN, message, correlationId, metadata);
    }

    error(
        message: string,
        error?: Error,
        correlationId?: string,
        metadata?: LogMetadata,
    ): void {
        this.log(LogLevel.ERROR, message, correlationId, metadata, error);
    }

    fatal(
        message: string,
        error?: Error,
        correlationId?: string,
        metadata?: LogMetadata,
    ): void {
        this.log(LogLevel.FATAL, message, correlationId, metadata, error);
    }

    // Performance Logging
    startTimer(
        operation: string,
        correlationId?: string,
        metadata?: LogMetadata,
    ): string {
        const timerId = randomUUID();
        this.activeTimers.set(timerId, {
            operation,
            startTime: Date.now(),
            correlationId,
            metadata,
        });
        if (this.config.enablePerformanceLogging) {
            this.debug(`Started operation: ${operation}`, correlationId, {
                timerId,
                ...metadata,
            });
        }
        return timerId;
    }

    endTimer(timerId: string, additionalMetadata?: LogMetadata): number | null {
        const timer = this.activeTimers.get(timerId);
        if (!timer) {
            this.warn(`Timer not found: ${timerId}`);
            return null;
        }
        const duration = Date.now() - timer.startTime;
        this.activeTimers.delete(timerId);
        if (
            this.config.enablePerformanceLogging &&
            this.shouldLog(LogLevel.DEBUG)
        ) {
            this.writeLog(this.createLogEntry(
                LogLevel.DEBUG,
                `Completed operation: ${timer.operation}`,
                timer.correlationId,
                timer.operation,
                duration,
                { timerId, ...timer.metadata, ...additionalMetadata },
            ));
        }
        return duration;
    }

    getActiveTimerCount(): number {
        return this.activeTimers.size;
    }
}
