import pino from 'pino';
import type { Logger } from 'pino';

// Root logger; modules take a child with their context via createLogger
const centralLogger = pino({
    timestamp: pino.stdTimeFunctions.isoTime,
    level: process.env.LOG_LEVEL || 'info',
    base: {
        pid: process.pid,
        hostname: process.env.HOSTNAME || 'localhost',
    },
    transport: process.env.NODE_ENV === 'development' ? {
        target: 'pino-pretty',
        options: {
            translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
            colorize: true,
        }
    } : undefined,
});

export function createLogger(context?: string): Logger {
    return context ? centralLogger.child({ context }) : centralLogger;
}

export default centralLogger;
