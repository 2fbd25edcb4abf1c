import 'dotenv/config';

// Application
import { type LoggerPort } from './application/ports/outbound/logging/logger.port.js';

// Infrastructure
import { PinoLogger } from './infrastructure/outbound/logging/pino.logger.js';

import { createContainer } from './di/container.js';

const start = async () => {
    const container = createContainer();

    // Stands in until the configuration has been validated
    let logger: LoggerPort = new PinoLogger({ level: 'info', prettyPrint: false });

    try {
        logger = container.get('Logger');
        const config = container.get('Configuration');
        const worker = container.get('Worker');
        const { env, tasks } = config.getInboundConfiguration();

        logger.info('app:start', { env, schedule: tasks.dailyDigest.schedule });

        const shutdown = () => {
            worker.stop().catch((error: unknown) => logger.error('app:stop', { error }));
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);

        await worker.initialize();

        logger.info('app:ready');
    } catch (error) {
        logger.error('app:error', { error });
    }
};

void start();
