/**
 * Logger Contract
 *
 * The engine logs through this interface only. Applications plug in their
 * own sink; the default writes to the console with a level prefix.
 */

export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Default console logger.
 */
export const consoleLogger: EngineLogger = {
    debug: (msg, data) => console.debug(`[DEBUG] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[INFO] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[WARN] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};

/**
 * Logger that drops everything.
 */
export const silentLogger: EngineLogger = {
    debug: () => undefined,
    info : () => undefined,
    warn : () => undefined,
    error: () => undefined,
};

/**
 * Prefix every message of a logger, e.g. "[registry] ...".
 */
export function scopedLogger(logger: EngineLogger, scope: string): EngineLogger {
    return {
        debug: (msg, data) => logger.debug(`[${scope}] ${msg}`, data),
        info : (msg, data) => logger.info(`[${scope}] ${msg}`, data),
        warn : (msg, data) => logger.warn(`[${scope}] ${msg}`, data),
        error: (msg, data) => logger.error(`[${scope}] ${msg}`, data),
    };
}
