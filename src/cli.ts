#!/usr/bin/env node
/**
 * @module
 * Command line entry point: runs a target of the standard pipeline.
 */
import {
    Command,
    CommanderError,
} from 'commander';
import type {
    Logger,
} from 'pino';
import {
    detectCapabilities,
} from './capability';
import {
    BuildArguments,
    loadSettings,
} from './config';
import {
    run,
} from './engine';
import {
    describeError,
    TaskFailedError,
} from './errors';
import {
    invoke,
    Invoker,
} from './invoke';
import {
    CAPABILITY_PROBES,
    registerPipeline,
} from './pipeline';
import {
    createProgress,
    ProgressStream,
} from './progress';
import {
    TaskRegistry,
} from './registry';
import {
    resolveNames,
} from './resolve';
import {
    formatSummary,
} from './summary';

const VERSION = '1.0.0';

/**
 * Things the CLI talks to, replaceable for testing.
 */
export interface CliEnvironment {
    /** Default: `process.env`. */
    env?: Record<string, string | undefined>;
    /** Default: `process.stdout`. */
    stdout?: ProgressStream;
    /** Default: `process.stderr`. */
    stderr?: NodeJS.WritableStream;
    /** Default: {@link invoke}. */
    invoker?: Invoker;
    logger?: Logger;
}

interface CliOptions {
    configuration?: string;
    artifactsDir?: string;
    preReleaseSuffix?: string;
    buildNumber?: string;
    cwd?: string;
    list?: boolean;
    dryRun?: boolean;
}

/**
 * Create and configure the CLI program.
 */
export function createProgram(environment: CliEnvironment = {}): Command {
    const env = environment.env || process.env;
    const stdout = environment.stdout || process.stdout;
    const stderr = environment.stderr || process.stderr;
    const invoker = environment.invoker || invoke;

    const program = new Command();
    program
        .name('depbuild')
        .description('Cleans, restores, builds, tests and packs a .NET solution')
        .version(VERSION, '-v, --version', 'Output the current version')
        .argument('[target]', 'task to run (env: TARGET, default: Default)')
        .option('-c, --configuration <name>', 'build configuration (env: CONFIGURATION, default: Release)')
        .option('--artifacts-dir <dir>', 'output directory (env: ARTIFACTS_DIR, default: Artifacts)')
        .option('--pre-release-suffix <suffix>', 'package pre-release label (env: PRE_RELEASE_SUFFIX, default: beta)')
        .option('--build-number <number>', 'build number (env: BUILD_NUMBER, default: 0)')
        .option('-C, --cwd <dir>', 'solution directory')
        .option('--list', 'list the tasks and exit')
        .option('--dry-run', 'print the tasks the target needs and exit')
        .configureOutput({
            writeErr: str => stderr.write(str),
            writeOut: str => stdout.write(str),
        })
        .exitOverride()
        .action(async (target: string | undefined, options: CliOptions) => {
            const args: BuildArguments = {
                artifactsDir: options.artifactsDir,
                buildNumber: options.buildNumber,
                configuration: options.configuration,
                preReleaseSuffix: options.preReleaseSuffix,
                target,
            };
            const settings = loadSettings(args, env);
            const registry = new TaskRegistry();
            registerPipeline(registry, {cwd: options.cwd});

            if (options.list) {
                stdout.write(formatTaskList(registry));
                return;
            }
            const order = resolveNames(registry, settings.target);
            if (options.dryRun) {
                stdout.write(order.map(name => `${name}\n`).join(''));
                return;
            }

            const capabilities = await detectCapabilities(CAPABILITY_PROBES, invoker);
            const result = await run(registry, settings.target, {
                capabilities,
                invoker,
                logger: environment.logger,
                progress: createProgress(stdout),
                settings,
            });
            stdout.write(formatSummary(result));
        });

    return program;
}

/**
 * Run the CLI program.
 *
 * @returns the process exit code.
 */
export async function runCli(argv: string[] = process.argv, environment: CliEnvironment = {}): Promise<number> {
    const stderr = environment.stderr || process.stderr;
    const program = createProgram(environment);
    try {
        await program.parseAsync(argv);
        return 0;
    } catch (e) {
        // Commander already printed help, version and usage errors.
        if (e instanceof CommanderError)
            return e.exitCode;
        stderr.write(`${formatFailure(e)}\n`);
        return 1;
    }
}

/**
 * Message printed when a run fails.
 */
export function formatFailure(e: unknown): string {
    if (e instanceof TaskFailedError)
        return e.message;
    return `error: ${describeError(e)}`;
}

function formatTaskList(registry: TaskRegistry): string {
    const lines: string[] = [];
    for (const task of registry.values()) {
        lines.push(`${task.name.padEnd(30)}${task.description || ''}`.trimEnd());
        if (task.dependencies.length)
            lines.push(`${''.padEnd(30)}depends on: ${task.dependencies.join(', ')}`);
    }
    return lines.map(line => `${line}\n`).join('');
}

if (require.main === module) {
    runCli().then(code => {
        process.exitCode = code;
    }, (e: unknown) => {
        process.stderr.write(`${describeError(e)}\n`);
        process.exitCode = 1;
    });
}
