import cron, { type ScheduledTask } from 'node-cron';

// Application
import { type TaskPort, type WorkerPort } from '../../../application/ports/inbound/worker.port.js';
import { type LoggerPort } from '../../../application/ports/outbound/logging/logger.port.js';

import { runTaskSafely } from './task-runner.js';

export class NodeCronAdapter implements WorkerPort {
    private readonly scheduledTasks: ScheduledTask[] = [];

    constructor(
        private readonly logger: LoggerPort,
        private readonly tasks: TaskPort[],
        private readonly timezone?: string,
    ) {}

    async initialize(): Promise<void> {
        this.logger.debug('Starting worker', { tasks: this.tasks.length });

        for (const task of this.tasks) {
            this.scheduleTask(task);
        }

        this.logger.debug('Worker initialization complete');
    }

    async stop(): Promise<void> {
        this.logger.info('Stopping worker', { runningTasks: this.scheduledTasks.length });

        for (const task of this.scheduledTasks) {
            task.stop();
        }

        this.scheduledTasks.length = 0;
        this.logger.info('Worker has stopped');
    }

    private scheduleTask(task: TaskPort): void {
        if (!task.schedule) {
            this.logger.warn('Task has no schedule, running it once', { task: task.name });
            void runTaskSafely(task, this.logger);
            return;
        }

        if (!cron.validate(task.schedule)) {
            this.logger.error('Invalid cron expression, task not scheduled', {
                schedule: task.schedule,
                task: task.name,
            });
            return;
        }

        this.logger.info('Scheduling task', {
            schedule: task.schedule,
            task: task.name,
            timezone: this.timezone,
        });

        const cronTask = cron.schedule(
            task.schedule,
            () => {
                void runTaskSafely(task, this.logger);
            },
            { scheduled: false, timezone: this.timezone },
        );

        this.scheduledTasks.push(cronTask);

        if (task.executeOnStartup) {
            this.logger.debug('Executing startup task', { task: task.name });
            void runTaskSafely(task, this.logger);
        }

        cronTask.start();
    }
}
