import { beforeEach, describe, expect, it } from 'vitest';

import { PinoLogger } from '../pino.logger.js';

describe('PinoLogger', () => {
    let lines: Array<Record<string, unknown>>;

    const createLogger = (level: 'debug' | 'info' | 'silent' = 'info') =>
        new PinoLogger(
            { level, prettyPrint: false },
            {
                write: (line: string) => {
                    lines.push(JSON.parse(line));
                },
            },
        );

    beforeEach(() => {
        lines = [];
    });

    it('should write the message and metadata as one JSON line', () => {
        // Given - a logger at info level
        const logger = createLogger();

        // When - logging with metadata
        logger.info('Fetched stories', { count: 3 });

        // Then - pino writes a single structured line
        expect(lines).toHaveLength(1);
        expect(lines[0]).toMatchObject({ count: 3, level: 30, msg: 'Fetched stories' });
    });

    it('should serialise errors under the error key', () => {
        // Given - a logger and an error
        const logger = createLogger();

        // When - logging the error as metadata
        logger.error('Push failed', { error: new Error('connection reset') });

        // Then - the error is serialised with its message and type
        expect(lines[0]).toMatchObject({
            error: { message: 'connection reset', type: 'Error' },
            level: 50,
            msg: 'Push failed',
        });
    });

    it('should drop messages below the configured level', () => {
        // Given - a logger at info level
        const logger = createLogger('info');

        // When - logging at debug and warn
        logger.debug('Constructed URL');
        logger.warn('Result count mismatch');

        // Then - only the warning is written
        expect(lines).toHaveLength(1);
        expect(lines[0]).toMatchObject({ level: 40, msg: 'Result count mismatch' });
    });

    it('should write nothing when silent', () => {
        // Given - a silent logger
        const logger = createLogger('silent');

        // When - logging at every level
        logger.debug('a');
        logger.info('b');
        logger.warn('c');
        logger.error('d');

        // Then - nothing is written
        expect(lines).toEqual([]);
    });
});
