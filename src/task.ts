import type {
    Logger,
} from 'pino';
import type {
    Capabilities,
} from './capability';
import type {
    BuildSettings,
} from './config';
import type {
    InvokeOptions,
} from './invoke';

/**
 * Context that will be passed to task guards and actions during a run.
 */
export interface TaskContext {
    /** Target requested for this run. */
    readonly target: string;
    /** Resolved build settings. */
    readonly settings: BuildSettings;
    /** Capabilities detected before the run. */
    readonly capabilities: Capabilities;
    /** Logger bound to the running task. */
    readonly logger: Logger;
    /** Runs an external command, forwarding its output to the run's progress. */
    invoke(command: string, args?: readonly string[], options?: InvokeOptions): Promise<number>;
}

/**
 * Function that runs a task.
 */
export type TaskAction = (ctx: TaskContext) => (Promise<void> | void);

/**
 * Function that runs a task for a single iteration item.
 */
export type ItemAction<T> = (ctx: TaskContext, item: T) => (Promise<void> | void);

/**
 * Lazy source of iteration items, evaluated when the task runs.
 */
export type ItemSource<T> = (ctx: TaskContext) => (Iterable<T> | AsyncIterable<T> | Promise<Iterable<T>>);

/**
 * Predicate deciding whether a task's action runs.
 */
export type TaskGuard = (ctx: TaskContext) => boolean;

/**
 * One unit of a per-item task, bound to its item.
 */
export interface TaskItem {
    readonly label: string;
    run(): Promise<void>;
}

export interface SingleTaskBody {
    readonly kind: 'single';
    readonly action: TaskAction;
}

export interface EachTaskBody {
    readonly kind: 'each';
    /** Takes a snapshot of the iteration source. */
    readonly expand: (ctx: TaskContext) => Promise<TaskItem[]>;
}

export type TaskBody = SingleTaskBody | EachTaskBody;

/**
 * Represents a registered task.
 */
export interface Task {
    /** Task name, unique within a registry. */
    readonly name: string;
    /** Task description. Default: the task name. */
    readonly description?: string;
    /** Names of the tasks that must complete first, in order. */
    readonly dependencies: readonly string[];
    readonly body: TaskBody;
    /** Default: always run. */
    readonly guard?: TaskGuard;
}

interface BaseTaskDefinition {
    name: string;
    description?: string;
    dependencies?: readonly string[];
    guard?: TaskGuard;
}

/**
 * Definition of a task whose action runs once.
 */
export interface TaskDefinition extends BaseTaskDefinition {
    /** Default: does nothing, useful for aggregate targets. */
    action?: TaskAction;
}

/**
 * Definition of a task whose action runs once per item.
 */
export interface EachTaskDefinition<T> extends BaseTaskDefinition {
    items: ItemSource<T>;
    action: ItemAction<T>;
    /** Label used in progress and errors. Default: `String(item)`. */
    label?: (item: T) => string;
}

/**
 * Constructs a task whose action runs once.
 */
export function createTask(definition: TaskDefinition): Task {
    const action = definition.action || noop;
    return freezeTask(definition, {
        action,
        kind: 'single',
    });
}

/**
 * Constructs a task whose action runs once for each item of `definition.items`.
 */
export function createEachTask<T>(definition: EachTaskDefinition<T>): Task {
    const {items, action} = definition;
    const label = definition.label || String;
    return freezeTask(definition, {
        expand: async ctx => {
            const values = await collect(items(ctx));
            return values.map(item => ({
                label: label(item),
                run: async () => {
                    await action(ctx, item);
                },
            }));
        },
        kind: 'each',
    });
}

function freezeTask(definition: BaseTaskDefinition, body: TaskBody): Task {
    if (typeof definition.name !== 'string' || !definition.name.length)
        throw new TypeError('task name must be a non-empty string');
    // Dependencies form an ordered set.
    const dependencies = Object.freeze([...new Set(definition.dependencies || [])]);
    return Object.freeze({
        body: Object.freeze(body),
        dependencies,
        description: definition.description,
        guard: definition.guard,
        name: definition.name,
    });
}

async function collect<T>(source: Iterable<T> | AsyncIterable<T> | Promise<Iterable<T>>): Promise<T[]> {
    const iterable = await source;
    const values: T[] = [];
    for await (const value of iterable)
        values.push(value);
    return values;
}

function noop(): void {
    // aggregate task
}
