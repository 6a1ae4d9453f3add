/**
 * Invalid input detected before any network activity: a missing or malformed
 * profile URL, an unreadable cookie file, or out-of-range options.
 */
export class ConfigError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigError';
    }
}
