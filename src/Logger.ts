export interface Logger {
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

//progress goes to stderr
export const consoleLogger : Logger = {
    info: (message, ...details) => console.error(`[AMB] ${message}`, ...details),
    warn: (message, ...details) => console.warn(`[AMB] ${message}`, ...details),
    error: (message, ...details) => console.error(`[AMB] ${message}`, ...details),
};

export const silentLogger : Logger = {
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
};
