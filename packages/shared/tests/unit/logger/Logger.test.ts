/**
 * Unit tests for Logger
 *
 * Covers level filtering, structured entries, sensitive data masking,
 * error formatting, performance timers and environment configuration.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";

import { Logger, type LoggerConfig, LogLevel } from "../../../src/logger/Logger";

describe("Logger", () => {
    let logger: Logger;
    let consoleSpy: {
        debug: jest.SpyInstance;
        info: jest.SpyInstance;
        warn: jest.SpyInstance;
        error: jest.SpyInstance;
    };

    const createTestConfig = (
        overrides: Partial<LoggerConfig> = {},
    ): LoggerConfig => ({
        level: LogLevel.DEBUG,
        component: "test-component",
        enableConsole: true,
        enableFile: false,
        enablePerformanceLogging: true,
        sensitiveFields: ["password", "secret", "token", "apikey"],
        maxStackTraceLines: 3,
        ...overrides,
    });

    const lastEntry = (spy: jest.SpyInstance): Record<string, unknown> => {
        const calls = spy.mock.calls;
        return JSON.parse(String(calls[calls.length - 1][0]));
    };

    beforeEach(() => {
        logger = new Logger(createTestConfig());
        consoleSpy = {
            debug: jest.spyOn(console, "debug").mockImplementation(),
            info: jest.spyOn(console, "info").mockImplementation(),
            warn: jest.spyOn(console, "warn").mockImplementation(),
            error: jest.spyOn(console, "error").mockImplementation(),
        };
    });

    afterEach(() => {
        jest.restoreAllMocks();
        Logger.resetInstance();
    });

    describe("LogLevel Enum", () => {
        it("should have correct severity order", () => {
            expect(LogLevel.DEBUG).toBe(0);
            expect(LogLevel.INFO).toBe(1);
            expect(LogLevel.WARN).toBe(2);
            expect(LogLevel.ERROR).toBe(3);
            expect(LogLevel.FATAL).toBe(4);
        });
    });

    describe("Basic Logging Methods", () => {
        it("should route each level to the matching console method", () => {
            logger.debug("debug message");
            logger.info("info message");
            logger.warn("warn message");
            logger.error("error message");
            logger.fatal("fatal message");

            expect(consoleSpy.debug).toHaveBeenCalledTimes(1);
            expect(consoleSpy.info).toHaveBeenCalledTimes(1);
            expect(consoleSpy.warn).toHaveBeenCalledTimes(1);
            expect(consoleSpy.error).toHaveBeenCalledTimes(2);
        });

        it("should write a structured entry", () => {
            logger.info("Signal emitted", "corr-1", { asset: "BTC", score: 87 });

            const entry = lastEntry(consoleSpy.info);
            expect(entry.level).toBe("INFO");
            expect(entry.message).toBe("Signal emitted");
            expect(entry.component).toBe("test-component");
            expect(entry.correlationId).toBe("corr-1");
            expect(entry.metadata).toEqual({ asset: "BTC", score: 87 });
            expect(typeof entry.timestamp).toBe("string");
        });

        it("should skip entries below the configured level", () => {
            logger = new Logger(createTestConfig({ level: LogLevel.WARN }));

            logger.debug("hidden");
            logger.info("hidden");
            logger.warn("shown");

            expect(consoleSpy.debug).not.toHaveBeenCalled();
            expect(consoleSpy.info).not.toHaveBeenCalled();
            expect(consoleSpy.warn).toHaveBeenCalledTimes(1);
        });

        it("should write nothing when console output is disabled", () => {
            logger = new Logger(createTestConfig({ enableConsole: false }));

            logger.error("quiet");

            expect(consoleSpy.error).not.toHaveBeenCalled();
        });
    });

    describe("Sensitive Data Masking", () => {
        it("should mask sensitive keys at any depth", () => {
            logger.info("Connecting", undefined, {
                apiKey: "test-secret",
                nested: { password: "test-password", venue: "spot" },
                list: [{ token: "test-token" }],
            });

            expect(lastEntry(consoleSpy.info).metadata).toEqual({
                apiKey: "[MASKED]",
                nested: { password: "[MASKED]", venue: "spot" },
                list: [{ token: "[MASKED]" }],
            });
        });

        it("should leave ordinary values untouched", () => {
            logger.info("Evaluated", undefined, { reasons: ["RSI bullish"], ok: true });

            expect(lastEntry(consoleSpy.info).metadata).toEqual({
                reasons: ["RSI bullish"],
                ok: true,
            });
        });
    });

    describe("Error Formatting", () => {
        it("should include name, message and a truncated stack", () => {
            const error = new Error("store unavailable");
            error.stack = ["Error: store unavailable", "at a", "at b", "at c", "at d"].join("\n");

            logger.error("Emission failed", error, "corr-2");

            const entry = lastEntry(consoleSpy.error);
            expect(entry.error).toEqual({
                name: "Error",
                message: "store unavailable",
                stack: "Error: store unavailable\nat a\nat b",
            });
        });

        it("should carry an error code when present", () => {
            const error = Object.assign(new Error("missing"), { code: "ENOENT" });

            logger.fatal("Config missing", error);

            const entry = lastEntry(consoleSpy.error);
            expect(entry.level).toBe("FATAL");
            expect(entry.error).toMatchObject({ code: "ENOENT" });
        });
    });

    describe("Performance Timers", () => {
        it("should return a duration and clear the timer", () => {
            const timerId = logger.startTimer("evaluateAsset", "corr-3", { asset: "ETH" });

            expect(logger.getActiveTimerCount()).toBe(1);
            const duration = logger.endTimer(timerId);

            expect(duration).not.toBeNull();
            expect(duration).toBeGreaterThanOrEqual(0);
            expect(logger.getActiveTimerCount()).toBe(0);

            const entry = lastEntry(consoleSpy.debug);
            expect(entry.message).toBe("Completed operation: evaluateAsset");
            expect(entry.operation).toBe("evaluateAsset");
        });

        it("should warn about unknown timers", () => {
            expect(logger.endTimer("missing")).toBeNull();
            expect(lastEntry(consoleSpy.warn).message).toBe("Timer not found: missing");
        });
    });

    describe("Child Loggers", () => {
        it("should keep settings under a new component name", () => {
            logger.child("emission").info("child entry");

            expect(lastEntry(consoleSpy.info).component).toBe("emission");
        });
    });

    describe("File Output", () => {
        it("should append JSON lines to the log file", () => {
            const dir = fs.mkdtempSync(path.join(os.tmpdir(), "logger-test-"));
            const filePath = path.join(dir, "nested", "engine.log");
            logger = new Logger(createTestConfig({ enableFile: true, filePath }));

            logger.info("first");
            logger.info("second");

            const lines = fs.readFileSync(filePath, "utf-8").trim().split("\n");
            expect(lines.map((line) => JSON.parse(line).message)).toEqual(["first", "second"]);
            fs.rmSync(dir, { recursive: true, force: true });
        });
    });

    describe("Environment Configuration", () => {
        const originalEnv = process.env;

        beforeEach(() => {
            process.env = { ...originalEnv };
        });

        afterEach(() => {
            process.env = originalEnv;
        });

        it("should read level and sinks from the environment", () => {
            process.env.LOG_LEVEL = "warn";
            process.env.LOG_ENABLE_FILE = "true";
            process.env.LOG_FILE_PATH = "/tmp/engine.log";
            process.env.LOG_SENSITIVE_FIELDS = "secret, passphrase";
            process.env.LOG_MAX_STACK_LINES = "4";

            const config = Logger.createConfigFromEnv("signal-engine");

            expect(config).toEqual({
                level: LogLevel.WARN,
                component: "signal-engine",
                enableConsole: true,
                enableFile: true,
                filePath: "/tmp/engine.log",
                enablePerformanceLogging: true,
                sensitiveFields: ["secret", "passphrase"],
                maxStackTraceLines: 4,
            });
        });

        it("should fall back to INFO for unknown levels", () => {
            process.env.LOG_LEVEL = "verbose";

            expect(Logger.createConfigFromEnv("x").level).toBe(LogLevel.INFO);
        });

        it("should hand out one singleton until reset", () => {
            const first = Logger.getInstance("a");

            expect(Logger.getInstance("b")).toBe(first);
            Logger.resetInstance();
            expect(Logger.getInstance("b")).not.toBe(first);
        });
    });
});
