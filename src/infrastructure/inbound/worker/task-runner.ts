// Application
import { type TaskPort } from '../../../application/ports/inbound/worker.port.js';
import { type LoggerPort } from '../../../application/ports/outbound/logging/logger.port.js';

/**
 * Runs a task and logs its outcome. Never rejects: a failing run must not take the worker down.
 */
export async function runTaskSafely(task: TaskPort, logger: LoggerPort): Promise<void> {
    const start = Date.now();
    logger.debug('Task started', { task: task.name });

    try {
        await task.execute();
        logger.info('Task completed successfully', {
            durationMs: Date.now() - start,
            task: task.name,
        });
    } catch (error) {
        logger.error('Task execution error', { error, task: task.name });
    }
}
