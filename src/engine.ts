/**
 * @module
 * Runs resolved tasks.
 */
import type {
    Logger,
} from 'pino';
import {
    Capabilities,
} from './capability';
import {
    BuildSettings,
    loadSettings,
} from './config';
import {
    TaskFailedError,
} from './errors';
import {
    invoke,
    InvokeOptions,
    Invoker,
} from './invoke';
import {
    createLogger,
} from './logger';
import {
    createProgress,
    Progress,
} from './progress';
import {
    TaskRegistry,
} from './registry';
import {
    resolve,
} from './resolve';
import {
    Task,
    TaskContext,
} from './task';

/**
 * Options for {@link run}
 */
export interface RunOptions {
    /** Default: loaded from the environment, with the run's target. */
    settings?: BuildSettings;
    /** Default: no capabilities. */
    capabilities?: Capabilities;
    /** Default: console progress on stdout. */
    progress?: Progress;
    /** Default: the `engine` module logger. */
    logger?: Logger;
    /** Runs commands for `ctx.invoke`. Default: {@link invoke}. */
    invoker?: Invoker;
}

/**
 * Outcome of one task in a successful run.
 */
export interface TaskRecord {
    name: string;
    /** `skipped` if the guard returned false. */
    status: 'executed' | 'skipped';
    durationMs: number;
}

/**
 * Outcome of a successful run.
 */
export interface RunResult {
    target: string;
    /** Tasks whose action ran, in order. */
    executed: string[];
    /** Tasks whose guard returned false, in order. */
    skipped: string[];
    records: TaskRecord[];
    durationMs: number;
}

class Runner {
    private readonly registry: TaskRegistry;
    private readonly settings: BuildSettings;
    private readonly capabilities: Capabilities;
    private readonly progress: Progress;
    private readonly logger: Logger;
    private readonly invoker: Invoker;

    constructor(registry: TaskRegistry, target: string, options: RunOptions) {
        this.registry = registry;
        this.settings = options.settings || loadSettings({target});
        this.capabilities = options.capabilities || new Map();
        this.progress = options.progress || createProgress();
        this.logger = options.logger || createLogger('engine');
        this.invoker = options.invoker || invoke;
    }

    async run(target: string): Promise<RunResult> {
        // Configuration errors must surface before any action runs.
        const order = resolve(this.registry, target);
        this.logger.debug({order: order.map(task => task.name), target}, 'resolved target');

        const started = Date.now();
        const records: TaskRecord[] = [];
        try {
            for (const [index, task] of order.entries()) {
                const status = `[${index + 1}/${order.length}] ${task.description || task.name}`;
                records.push(await this.runTask(task, target, status));
            }
        } finally {
            this.progress.unrender();
        }

        return {
            durationMs: Date.now() - started,
            executed: records.filter(record => record.status === 'executed').map(record => record.name),
            records,
            skipped: records.filter(record => record.status === 'skipped').map(record => record.name),
            target,
        };
    }

    private async runTask(task: Task, target: string, status: string): Promise<TaskRecord> {
        const ctx = this.createContext(task, target);
        const started = Date.now();
        let item: string | undefined;
        try {
            if (task.guard && !task.guard(ctx)) {
                ctx.logger.debug('guard is false, skipping task');
                return {durationMs: 0, name: task.name, status: 'skipped'};
            }

            this.progress.status = status;
            this.progress.render();
            const body = task.body;
            if (body.kind === 'single') {
                await body.action(ctx);
            } else {
                const items = await body.expand(ctx);
                ctx.logger.debug({items: items.map(x => x.label)}, 'expanded items');
                for (const x of items) {
                    item = x.label;
                    this.progress.status = `${status} (${item})`;
                    this.progress.render();
                    await x.run();
                }
            }
        } catch (e) {
            throw e instanceof TaskFailedError ? e : new TaskFailedError(task.name, e, item);
        }

        const durationMs = Date.now() - started;
        ctx.logger.debug({durationMs}, 'task finished');
        return {durationMs, name: task.name, status: 'executed'};
    }

    private createContext(task: Task, target: string): TaskContext {
        const output = (chunk: Buffer) => this.progress.write(chunk);
        return {
            capabilities: this.capabilities,
            invoke: (command: string, args?: readonly string[], options?: InvokeOptions) =>
                this.invoker(command, args, {output, ...options}),
            logger: this.logger.child({task: task.name}),
            settings: this.settings,
            target,
        };
    }
}

/**
 * Resolves `target` and runs its tasks one at a time, in dependency order.
 *
 * Each call starts from scratch: a task that ran in an earlier call runs again.
 *
 * @throws {ConfigurationError} if no settings are given and the environment's are invalid.
 * @throws {UnknownTaskError|CyclicDependencyError} before any task runs, if `target` cannot be resolved.
 * @throws {TaskFailedError} wrapping the first failure; no task runs after it.
 */
export async function run(registry: TaskRegistry, target: string, options: RunOptions = {}): Promise<RunResult> {
    const runner = new Runner(registry, target, options);
    return runner.run(target);
}
