/**
 * Raised when CLI flags, environment variables or a config file carry a
 * value the harness cannot use.
 */
export class ConfigError extends Error {
    public readonly source: string;

    constructor(message: string, source: string) {
        super(`${source}: ${message}`);
        this.name = 'ConfigError';
        this.source = source;
    }
}
