import pino from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

export type LogContext = Map<string, string>;

export const contextStorage = new AsyncLocalStorage<LogContext>();

/**
 * Run `fn` with extra keys merged into the current logging context.
 */
export function withLogContext<T>(entries: Record<string, string>, fn: () => T): T {
    const store: LogContext = new Map(contextStorage.getStore() ?? []);
    for (const [key, value] of Object.entries(entries)) {
        store.set(key, value);
    }
    return contextStorage.run(store, fn);
}

const CONTEXT_KEYS = ['correlationId', 'requestId', 'category', 'jobId'] as const;

const logger = pino({
    name: 'tourpick',
    level: process.env.LOG_LEVEL || 'info',
    transport: process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        }
        : undefined,
    redact: {
        paths: [
            'apiKey',
            'api_key',
            'key',
            'params.key',
            'config.params.key',
            'GOOGLE_PLACES_API_KEY',
            '*.apiKey',
            'headers.authorization'
        ],
        censor: '[REDACTED]'
    },
    mixin() {
        const store = contextStorage.getStore();
        const context: Record<string, string> = {};

        if (store) {
            for (const key of CONTEXT_KEYS) {
                const value = store.get(key);
                if (value) {
                    context[key] = value;
                }
            }
        }

        return context;
    }
});

export default logger;
