/**
 * @module
 * depbuild Public API
 */
import {
    run,
    RunOptions,
    RunResult,
} from './engine';
import {
    TaskRegistry,
} from './registry';
import {
    resolveNames,
} from './resolve';
import {
    createTask,
    Task,
    TaskDefinition,
} from './task';

/**
 * Represents a build to be done.
 */
export interface Builder {
    /** Add a task to the build. */
    addTask(task: Task | TaskDefinition): void;
    /** Names of the tasks `target` needs, in the order they would run. */
    resolve(target: string): string[];
    /** Run the build. */
    run(target: string, options?: RunOptions): Promise<RunResult>;
    /** Registered tasks, in registration order. */
    tasks(): Task[];
    /** Underlying registry, e.g. for {@link registerPipeline}. */
    readonly registry: TaskRegistry;
}

class BuilderImpl implements Builder {
    readonly registry: TaskRegistry;

    constructor(registry: TaskRegistry) {
        this.registry = registry;
    }

    addTask(task: Task | TaskDefinition): void {
        this.registry.register(isTask(task) ? task : createTask(task));
    }

    resolve(target: string): string[] {
        return resolveNames(this.registry, target);
    }

    run(target: string, options?: RunOptions): Promise<RunResult> {
        return run(this.registry, target, options);
    }

    tasks(): Task[] {
        return [...this.registry.values()];
    }
}

/**
 * Construct a new build.
 */
export function newBuilder(): Builder {
    return new BuilderImpl(new TaskRegistry());
}

function isTask(x: Task | TaskDefinition): x is Task {
    return 'body' in x;
}

export type {
    Capabilities,
    CapabilityProbe,
    TraitMapping,
} from './capability';
export {
    buildTestFilter,
    detectCapabilities,
    detectCapability,
} from './capability';
export type {
    BuildArguments,
    BuildSettings,
    CiHost,
} from './config';
export {
    DEFAULT_TARGET,
    loadSettings,
    versionSuffix,
} from './config';
export type {
    DiscoveryOptions,
} from './discovery';
export {
    fileSet,
    findDirectories,
    findFiles,
    findSingleFile,
} from './discovery';
export type {
    RunOptions,
    RunResult,
    TaskRecord,
} from './engine';
export {
    run,
} from './engine';
export * from './errors';
export type {
    InvokeOptions,
    Invoker,
} from './invoke';
export {
    formatCommand,
    invoke,
} from './invoke';
export type {
    PipelineOptions,
} from './pipeline';
export {
    CAPABILITY_PROBES,
    TEST_TRAITS,
    registerPipeline,
} from './pipeline';
export type {
    Progress,
    ProgressStream,
} from './progress';
export {
    createProgress,
} from './progress';
export {
    TaskRegistry,
} from './registry';
export {
    resolve,
    resolveNames,
} from './resolve';
export {
    formatSummary,
} from './summary';
export type {
    EachTaskDefinition,
    ItemAction,
    ItemSource,
    Task,
    TaskAction,
    TaskContext,
    TaskDefinition,
    TaskGuard,
} from './task';
export {
    createEachTask,
    createTask,
} from './task';
