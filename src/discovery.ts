/**
 * @module
 * File discovery for per-item tasks and single-file lookups.
 */
import {
    DiscoveryMismatchError,
} from './errors';
import fg = require('fast-glob');

/**
 * Options for {@link findFiles}.
 */
export interface DiscoveryOptions {
    /** Directory the patterns are relative to. Default: the current directory. */
    cwd?: string;
    /** Patterns to exclude, on top of `node_modules`, `bin` and `obj` directories. */
    ignore?: string[];
}

const DEFAULT_IGNORE = ['**/node_modules/**', '**/bin/**', '**/obj/**'];

/**
 * Returns the files matching `patterns`, sorted.
 */
export async function findFiles(patterns: string | string[], options: DiscoveryOptions = {}): Promise<string[]> {
    const files = await fg(patterns, {
        cwd: options.cwd,
        dot: false,
        ignore: [...DEFAULT_IGNORE, ...(options.ignore || [])],
        onlyFiles: true,
    });
    return files.sort();
}

/**
 * Returns a lazy file set for use as an iteration source. The files are looked up each time the returned
 * function is called, i.e. once per run of the task.
 */
export function fileSet(patterns: string | string[], options: DiscoveryOptions = {}): () => Promise<string[]> {
    return () => findFiles(patterns, options);
}

/**
 * Returns the only file matching `patterns`.
 *
 * @throws {DiscoveryMismatchError} if no file or more than one file matches.
 */
export async function findSingleFile(patterns: string | string[], options: DiscoveryOptions = {}): Promise<string> {
    const files = await findFiles(patterns, options);
    if (files.length !== 1)
        throw new DiscoveryMismatchError(typeof patterns === 'string' ? [patterns] : patterns, files);
    return files[0];
}

/**
 * Returns the directories matching `patterns`, sorted. Only `node_modules` is excluded by default.
 */
export async function findDirectories(patterns: string | string[], options: DiscoveryOptions = {}): Promise<string[]> {
    const dirs = await fg(patterns, {
        cwd: options.cwd,
        ignore: ['**/node_modules/**', ...(options.ignore || [])],
        onlyDirectories: true,
    });
    return dirs.sort();
}
