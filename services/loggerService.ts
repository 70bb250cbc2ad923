import pino from 'pino';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogMeta = Record<string, unknown>;

const LEVELS: readonly string[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

const resolveLevel = (): string => {
    const requested = (process.env.LOG_LEVEL || '').toLowerCase();
    if (LEVELS.includes(requested)) return requested;
    return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
};

// Errors inside metadata are flattened so pino's serializer keeps message and stack
const normalizeMeta = (meta: LogMeta): LogMeta => {
    const normalized: LogMeta = {};
    for (const [key, value] of Object.entries(meta)) {
        normalized[key] = value instanceof Error
            ? { name: value.name, message: value.message, stack: value.stack }
            : value;
    }
    return normalized;
};

const baseLogger = pino({
    level: resolveLevel(),
    base: { service: 'memjudge' },
    formatters: {
        level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
});

const write = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (meta && Object.keys(meta).length > 0) {
        baseLogger[level](normalizeMeta(meta), message);
    } else {
        baseLogger[level](message);
    }
};

export const loggerService = {
    debug: (message: string, meta?: LogMeta) => write('debug', message, meta),
    info: (message: string, meta?: LogMeta) => write('info', message, meta),
    warn: (message: string, meta?: LogMeta) => write('warn', message, meta),
    error: (message: string, meta?: LogMeta) => write('error', message, meta),
};
