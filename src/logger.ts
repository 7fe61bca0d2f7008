import pino, {
    type Logger,
} from 'pino';

/**
 * Root logger. Writes JSON lines to stderr so that stdout stays free for build output.
 */
export const logger: Logger = pino({
    base: {
        hostname: undefined,
        pid: undefined,
    },
    level: process.env['DEPBUILD_LOG_LEVEL'] ?? 'info',
}, pino.destination(2));

/**
 * Returns a child logger tagged with `module`.
 */
export function createLogger(module: string): Logger {
    return logger.child({module});
}
