/**
 * @module
 * Errors raised while registering, resolving and running tasks.
 */

/**
 * Base class of all depbuild errors.
 */
export class BuildError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * A task with the same name is already registered.
 */
export class DuplicateTaskError extends BuildError {
    readonly taskName: string;

    constructor(taskName: string) {
        super(`Task '${taskName}' is already registered`);
        this.taskName = taskName;
    }
}

/**
 * A target or dependency names a task that is not registered.
 */
export class UnknownTaskError extends BuildError {
    readonly taskName: string;
    /** Task that declared the dependency, if the name came from a dependency list. */
    readonly referencedBy?: string;

    constructor(taskName: string, referencedBy?: string) {
        super(referencedBy === undefined ?
            `Task '${taskName}' is not registered` :
            `Task '${taskName}' (dependency of '${referencedBy}') is not registered`);
        this.taskName = taskName;
        this.referencedBy = referencedBy;
    }
}

/**
 * The dependency graph has a cycle.
 */
export class CyclicDependencyError extends BuildError {
    /** Task names along the cycle; the first name is repeated at the end. */
    readonly cycle: readonly string[];

    constructor(cycle: readonly string[]) {
        super(`Cyclic dependency detected: ${cycle.join(' -> ')}`);
        this.cycle = cycle;
    }
}

/**
 * An external command exited with a non-zero code.
 */
export class ProcessFailedError extends BuildError {
    readonly command: string;
    readonly args: readonly string[];
    /** Exit code, or `null` if the process was killed by a signal. */
    readonly exitCode: number | null;
    readonly signal: NodeJS.Signals | null;

    constructor(command: string, args: readonly string[], exitCode: number | null, signal: NodeJS.Signals | null = null, commandLine?: string) {
        super(`Command '${commandLine ?? [command, ...args].join(' ')}' ` +
              (exitCode === null ? `was killed by signal ${signal}` : `exited with code ${exitCode}`));
        this.command = command;
        this.args = args;
        this.exitCode = exitCode;
        this.signal = signal;
    }
}

/**
 * A lookup that expects exactly one file found none or several.
 */
export class DiscoveryMismatchError extends BuildError {
    readonly patterns: readonly string[];
    readonly matches: readonly string[];

    constructor(patterns: readonly string[], matches: readonly string[]) {
        super(matches.length ?
            `Expected exactly one file matching ${patterns.join(', ')} but found ${matches.length}: ${matches.join(', ')}` :
            `Expected exactly one file matching ${patterns.join(', ')} but found none`);
        this.patterns = patterns;
        this.matches = matches;
    }
}

/**
 * A build setting has an invalid value.
 */
export class ConfigurationError extends BuildError {}

/**
 * A task action failed. `cause` holds the original error.
 */
export class TaskFailedError extends BuildError {
    readonly taskName: string;
    /** Label of the iteration item being processed, for per-item tasks. */
    readonly item?: string;

    constructor(taskName: string, cause: unknown, item?: string) {
        super(`Task '${taskName}'${item === undefined ? '' : ` (item ${item})`} failed: ${describeError(cause)}`, {cause});
        this.taskName = taskName;
        this.item = item;
    }
}

/**
 * Returns the message of `e` if it is an error, else its string form.
 */
export function describeError(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
