/**
 * @module
 * Runs external commands.
 */
import {
    ProcessFailedError,
} from './errors';
import {
    createLogger,
} from './logger';
import childProcess = require('child_process');

const log = createLogger('invoke');

/**
 * Options for {@link invoke}.
 */
export interface InvokeOptions {
    /** Environment variables set on top of `process.env`. */
    env?: Record<string, string | undefined>;
    /** Working directory. Default: the current directory. */
    cwd?: string;
    /**
     * Receives stdout and stderr chunks as they arrive.
     * Default: written to `process.stdout`.
     */
    output?: (chunk: Buffer) => void;
    /**
     * Evaluated when the command fails. If it returns true, the failure is logged and the exit code is returned
     * instead of throwing.
     */
    tolerateFailure?: () => boolean;
}

/**
 * Function with the signature of {@link invoke}.
 */
export type Invoker = (command: string, args?: readonly string[], options?: InvokeOptions) => Promise<number>;

/**
 * Runs `command` and waits for it to exit.
 *
 * @returns the exit code.
 * @throws {ProcessFailedError} if the command exits with a non-zero code or is killed, unless
 * `options.tolerateFailure` says otherwise.
 */
export async function invoke(command: string, args: readonly string[] = [], options: InvokeOptions = {}): Promise<number> {
    const commandLine = formatCommand(command, args);
    log.debug({command: commandLine, cwd: options.cwd}, 'running command');
    const [code, signal] = await runCommand(command, args, options);
    if (code === 0)
        return code;

    if (options.tolerateFailure && options.tolerateFailure()) {
        log.warn({command: commandLine, exitCode: code, signal}, 'ignoring command failure');
        return code === null ? -1 : code;
    }
    throw new ProcessFailedError(command, args, code, signal, commandLine);
}

function runCommand(command: string, args: readonly string[], options: InvokeOptions): Promise<[number | null, NodeJS.Signals | null]> {
    return new Promise((resolve, reject) => {
        const output = options.output || writeStdout;
        const cp = childProcess.spawn(command, args, {
            cwd: options.cwd,
            env: options.env ? {...process.env, ...options.env} : process.env,
            stdio: ['ignore', 'pipe', 'pipe'],
        });
        cp.on('error', e => {
            reject(e);
        });
        cp.on('close', (code, signal) => {
            resolve([code, signal]);
        });
        const chunkCallback = (chunk: string | Buffer) => {
            output(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
        };
        cp.stdout.on('data', chunkCallback);
        cp.stderr.on('data', chunkCallback);
    });
}

function writeStdout(chunk: Buffer): void {
    process.stdout.write(chunk);
}

/**
 * Renders `command` and `args` as a shell command line.
 */
export function formatCommand(command: string, args: readonly string[] = []): string {
    return [command, ...args].map(quote).join(' ');
}

/**
 * Return a shell-escaped version of `x`
 */
function quote(x: string): string {
    if (!x.length)
        return '\'\'';
    else if (!/[^\w@%+=:,./-]/.test(x))
        return x;

    const y = x.replace(/'/g, `'"'"'`);
    return `'${y}'`;
}
