import { type DestinationStream, type Logger, type LoggerOptions, pino } from 'pino';

// Application
import {
    type LoggerLevel,
    type LoggerMetadata,
    type LoggerPort,
} from '../../../application/ports/outbound/logging/logger.port.js';

export interface PinoLoggerConfiguration {
    level: LoggerLevel;
    prettyPrint: boolean;
}

/**
 * Pino backed logger. A destination stream bypasses the pretty transport.
 */
export class PinoLogger implements LoggerPort {
    private readonly logger: Logger;

    constructor(configuration: PinoLoggerConfiguration, destination?: DestinationStream) {
        const options: LoggerOptions = {
            level: configuration.level,
            serializers: {
                error: pino.stdSerializers.err,
            },
        };

        if (destination) {
            this.logger = pino(options, destination);
        } else if (configuration.prettyPrint) {
            this.logger = pino({
                ...options,
                transport: {
                    options: { colorize: true, ignore: 'pid,hostname' },
                    target: 'pino-pretty',
                },
            });
        } else {
            this.logger = pino(options);
        }
    }

    public debug(message: string, metadata?: LoggerMetadata): void {
        this.logger.debug(metadata ?? {}, message);
    }

    public error(message: string, metadata?: LoggerMetadata): void {
        this.logger.error(metadata ?? {}, message);
    }

    public info(message: string, metadata?: LoggerMetadata): void {
        this.logger.info(metadata ?? {}, message);
    }

    public warn(message: string, metadata?: LoggerMetadata): void {
        this.logger.warn(metadata ?? {}, message);
    }
}
