/**
 * Logger handed to enrichers, scoped by enricher id
 */
export interface EnricherLogger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
}

export function createEnricherLogger(enricherId: string): EnricherLogger {
    const prefix = `[enricher:${enricherId}]`;
    return {
        debug: (message, ...args) => console.debug(prefix, message, ...args),
        info: (message, ...args) => console.info(prefix, message, ...args),
        warn: (message, ...args) => console.warn(prefix, message, ...args),
        error: (message, ...args) => console.error(prefix, message, ...args),
    };
}
