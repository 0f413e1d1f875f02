import { config } from 'dotenv';
import pino from 'pino';

// LOG_LEVEL and NODE_ENV may come from .env
config();

/**
 * Logger Interface
 *
 * Defines the contract for logging operations across the application.
 * Calls are object-first: structured fields, then the message.
 */
export interface ILogger {
    info(data: object, message: string): void;
    error(data: object, message: string): void;
    warn(data: object, message: string): void;
    debug(data: object, message: string): void;
}

/**
 * Logger Configuration
 *
 * JSON logger for the ensemble judge service. Pretty-printed outside
 * of tests; plain JSON under Vitest so no transport worker is spawned.
 */
export const logger = pino({
    level: process.env.LOG_LEVEL || 'info',
    transport: process.env.NODE_ENV === 'test' ? undefined : {
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            singleLine: false
        }
    },
    serializers: {
        req: pino.stdSerializers.req,
        res: pino.stdSerializers.res,
        err: pino.stdSerializers.err
    }
});
