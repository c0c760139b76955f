import pino from 'pino';
import { getConfig } from './config';

/**
 * Logger Interface
 *
 * Defines the contract for logging operations across the application.
 * Structured data comes first, the human-readable message second.
 */
export interface ILogger {
    info(data: object, message: string): void;
    error(data: object, message: string): void;
    warn(data: object, message: string): void;
    debug(data: object, message: string): void;
}

const appConfig = getConfig();

/**
 * Logger Configuration
 *
 * JSON logger for the resume match service. Pretty printing is only
 * enabled for local development; tests and production emit plain JSON.
 */
export const logger = pino({
    level: appConfig.logLevel,
    ...(appConfig.nodeEnv === 'development'
        ? {
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                    singleLine: false
                }
            }
        }
        : {}),
    serializers: {
        req: pino.stdSerializers.req,
        res: pino.stdSerializers.res,
        err: pino.stdSerializers.err
    }
});
