import winston from "winston";

import type { LogLevel } from "./config.js";
import { logLevel } from "./config.js";
import { ConfigError } from "./errors.js";

let logger: winston.Logger | null = null;

// An invalid INTERCHANGE_LOG_LEVEL must not make a log call throw: fall back to "info" and report it once.
function resolveLevel(): { level: LogLevel, problem: string | undefined } {
    try {
        return { level: logLevel(), problem: undefined };
    } catch (e) {
        if (e instanceof ConfigError) {
            return { level: "info", problem: e.message };
        }
        throw e;
    }
}

function createLogger(): winston.Logger {
    const { level, problem } = resolveLevel();
    const created = winston.createLogger({
        level,
        format: winston.format.combine(
            winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
            winston.format.errors({ stack: true }),
            winston.format.printf(({ level, message, timestamp, stack }) => {
                const prefix = `[${timestamp}] [interchange] [${level.toUpperCase()}]`;
                if (stack) {
                    return `${prefix} ${message}\n${stack}`;
                }
                return `${prefix} ${message}`;
            }),
        ),
        transports: [new winston.transports.Console()],
        exitOnError: false,
    });
    if (problem !== undefined) {
        created.warn(`${problem}; logging at "info"`);
    }
    return created;
}

function getLogger(): winston.Logger {
    if (!logger) {
        logger = createLogger();
    }
    return logger;
}

export const log = {
    error: (message: string, meta?: Record<string, unknown>) => getLogger().error(message, meta),
    warn: (message: string, meta?: Record<string, unknown>) => getLogger().warn(message, meta),
    info: (message: string, meta?: Record<string, unknown>) => getLogger().info(message, meta),
    debug: (message: string, meta?: Record<string, unknown>) => getLogger().debug(message, meta),
};

/** Drops the cached logger so that the next message picks up the current log level. */
export function resetLogger(): void {
    logger = null;
}
