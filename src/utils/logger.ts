import pino from 'pino';

const isDev = process.env.NODE_ENV === 'development';
const level = process.env.LOG_LEVEL || (isDev ? 'debug' : 'info');

type LogMeta = Record<string, unknown>;

// Create the raw pino logger
const createPinoLogger = () => {
    if (isDev) {
        // Development: Use pino-pretty for colored console output
        return pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'yyyy-mm-dd HH:MM:ss:l',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    // Single-line JSON to stdout; the caller decides where it goes
    return pino({
        level,
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: {
            level: (label) => ({ level: label }),
        },
    });
};

const pinoInstance = createPinoLogger();

export const pinoLogger = pinoInstance;

export interface ContextLogger {
    error: (message: string, meta?: LogMeta) => void;
    warn: (message: string, meta?: LogMeta) => void;
    info: (message: string, meta?: LogMeta) => void;
    debug: (message: string, meta?: LogMeta) => void;
}

function wrap(instance: pino.Logger): ContextLogger {
    return {
        error: (message, meta) => meta ? instance.error(meta, message) : instance.error(message),
        warn: (message, meta) => meta ? instance.warn(meta, message) : instance.warn(message),
        info: (message, meta) => meta ? instance.info(meta, message) : instance.info(message),
        debug: (message, meta) => meta ? instance.debug(meta, message) : instance.debug(message),
    };
}

/**
 * Message-first logger wrapper.
 *
 * Call sites:  Logger.info('message', { meta })
 * Pino API:    pino.info({ meta }, 'message')
 */
export const Logger = {
    ...wrap(pinoInstance),
    // Child logger support for contextual logging
    child: (bindings: LogMeta): ContextLogger => wrap(pinoInstance.child(bindings)),
};
