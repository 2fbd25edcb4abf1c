// Application
import { type TaskPort, type WorkerPort } from '../../../application/ports/inbound/worker.port.js';
import { type LoggerPort } from '../../../application/ports/outbound/logging/logger.port.js';

import { runTaskSafely } from './task-runner.js';

/**
 * Runs every task once, in order, and resolves when the last one has finished
 */
export class ImmediateAdapter implements WorkerPort {
    constructor(
        private readonly logger: LoggerPort,
        private readonly tasks: TaskPort[],
    ) {}

    async initialize(): Promise<void> {
        this.logger.debug('Running tasks once', { tasks: this.tasks.length });

        for (const task of this.tasks) {
            await runTaskSafely(task, this.logger);
        }
    }

    async stop(): Promise<void> {
        this.logger.debug('Nothing scheduled, worker stopped');
    }
}
