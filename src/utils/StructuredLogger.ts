export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
    debug(message: string, fields?: LogFields): void;
    info(message: string, fields?: LogFields): void;
    warn(message: string, fields?: LogFields): void;
    error(message: string, fields?: LogFields): void;
    /** Returns a logger that stamps `fields` onto every record. */
    child(fields: LogFields): Logger;
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

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const requested = (env.LARGEFILE_LOG_LEVEL ?? "").trim().toLowerCase();
    if (isLogLevel(requested)) {
        return requested;
    }
    return env.LARGEFILE_DEBUG === "true" ? "debug" : "info";
}

export function createLogger(component: string, bound: LogFields = {}, level: LogLevel = resolveLogLevel()): Logger {
    const log = (recordLevel: LogLevel, message: string, fields?: LogFields) => {
        if (LEVEL_PRIORITY[recordLevel] < LEVEL_PRIORITY[level]) {
            return;
        }
        const payload = {
            timestamp: new Date().toISOString(),
            level: recordLevel,
            component,
            message,
            ...bound,
            ...(fields ?? {})
        };
        const sink = recordLevel === "error" ? console.error
            : recordLevel === "warn" ? console.warn
            : recordLevel === "debug" ? console.debug
            : console.info;
        sink(payload);
    };

    return {
        debug: (message, fields) => log("debug", message, fields),
        info: (message, fields) => log("info", message, fields),
        warn: (message, fields) => log("warn", message, fields),
        error: (message, fields) => log("error", message, fields),
        child: (fields) => createLogger(component, { ...bound, ...fields }, level)
    };
}
