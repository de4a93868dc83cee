/**
 * Console logging with a process-wide level gate.
 *
 * Modules log through `console` with a bracketed component prefix
 * ("[Engine] ...").  Warnings and errors always print; debug and info are
 * gated so the terminal panel stays readable.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

let threshold = LOG_LEVELS.indexOf("info");

export function setLogLevel(level: LogLevel) {
    threshold = LOG_LEVELS.indexOf(level);
}

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

function enabled(level: LogLevel) {
    return LOG_LEVELS.indexOf(level) >= threshold;
}

export const log = {
    debug(...args: unknown[]) {
        if (enabled("debug")) console.debug(...args);
    },
    info(...args: unknown[]) {
        if (enabled("info")) console.info(...args);
    },
    warn(...args: unknown[]) {
        console.warn(...args);
    },
    error(...args: unknown[]) {
        console.error(...args);
    },
};
