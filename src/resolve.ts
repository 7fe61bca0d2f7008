/**
 * @module
 * Dependency resolution.
 */
import {
    CyclicDependencyError,
} from './errors';
import {
    TaskRegistry,
} from './registry';
import {
    Task,
} from './task';

/**
 * Returns the tasks needed to build `target`, each one after all of its transitive dependencies.
 *
 * Dependencies are visited depth-first in declared order, so the first task to reach a shared dependency decides
 * where it goes. The whole graph below `target` is validated before anything is returned.
 */
export function resolve(registry: TaskRegistry, target: string): Task[] {
    const order: Task[] = [];
    const done = new Set<string>();
    const visiting: string[] = [];

    visit(registry.lookup(target));
    return order;

    function visit(task: Task): void {
        if (done.has(task.name))
            return;
        const cycleStart = visiting.indexOf(task.name);
        if (cycleStart >= 0)
            throw new CyclicDependencyError([...visiting.slice(cycleStart), task.name]);
        visiting.push(task.name);
        for (const name of task.dependencies)
            visit(registry.lookup(name, task.name));
        visiting.pop();
        done.add(task.name);
        order.push(task);
    }
}

/**
 * Like {@link resolve}, but returns only the task names.
 */
export function resolveNames(registry: TaskRegistry, target: string): string[] {
    return resolve(registry, target).map(task => task.name);
}
