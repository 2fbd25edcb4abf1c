/**
 * Represents a task that can be scheduled and executed
 */
export interface TaskPort {
    /**
     * The function to execute when the task runs
     */
    execute: () => Promise<void>;

    /**
     * Whether the task should be executed immediately on startup
     * @default false
     */
    executeOnStartup?: boolean;

    /**
     * Unique name of the task
     */
    name: string;

    /**
     * Cron expression defining when the task should run; a task without one runs once
     */
    schedule?: string;
}

/**
 * Worker port - defines how background tasks are run and stopped
 */
export interface WorkerPort {
    /**
     * Initialize the worker and start all registered tasks
     */
    initialize(): Promise<void>;

    /**
     * Stop all scheduled tasks
     */
    stop(): Promise<void>;
}
