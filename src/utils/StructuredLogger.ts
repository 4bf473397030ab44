export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
    debug(message: string, fields?: Record<string, unknown>): void;
    info(message: string, fields?: Record<string, unknown>): void;
    warn(message: string, fields?: Record<string, unknown>): void;
    error(message: string, fields?: Record<string, unknown>): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

/**
 * Level is read on every call so tests and the CLI can adjust
 * OUTLINE_LOG_LEVEL after modules have loaded.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const requested = (env.OUTLINE_LOG_LEVEL ?? "").toLowerCase();
    if (requested && isLogLevel(requested)) {
        return requested;
    }
    return env.OUTLINE_DEBUG === "true" ? "debug" : "info";
}

export function createLogger(component: string): Logger {
    const log = (level: LogLevel, message: string, fields?: Record<string, unknown>) => {
        if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[resolveLogLevel()]) {
            return;
        }
        const payload = {
            timestamp: new Date().toISOString(),
            level,
            component,
            message,
            ...(fields ?? {})
        };
        const sink = level === "error" ? console.error
            : level === "warn" ? console.warn
            : level === "debug" ? console.debug
            : console.info;
        sink(payload);
    };

    return {
        debug: (message, fields) => log("debug", message, fields),
        info: (message, fields) => log("info", message, fields),
        warn: (message, fields) => log("warn", message, fields),
        error: (message, fields) => log("error", message, fields)
    };
}
