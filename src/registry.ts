import {
    DuplicateTaskError,
    UnknownTaskError,
} from './errors';
import {
    Task,
} from './task';

/**
 * Write-once store of task definitions, keyed by task name.
 */
export class TaskRegistry {
    private readonly tasks: Map<string, Task>;

    constructor(tasks?: Iterable<Task>) {
        this.tasks = new Map();
        for (const task of tasks || [])
            this.register(task);
    }

    get size(): number {
        return this.tasks.size;
    }

    register(task: Task): void {
        if (this.tasks.has(task.name))
            throw new DuplicateTaskError(task.name);
        this.tasks.set(task.name, task);
    }

    /**
     * Returns the task named `name`.
     *
     * @param referencedBy task that depends on `name`, reported if the lookup fails.
     */
    lookup(name: string, referencedBy?: string): Task {
        const task = this.tasks.get(name);
        if (!task)
            throw new UnknownTaskError(name, referencedBy);
        return task;
    }

    has(name: string): boolean {
        return this.tasks.has(name);
    }

    /** Task names in registration order. */
    names(): string[] {
        return [...this.tasks.keys()];
    }

    values(): IterableIterator<Task> {
        return this.tasks.values();
    }
}
