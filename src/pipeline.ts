/**
 * @module
 * The standard build pipeline for a .NET solution: clean, restore, build, test and pack.
 */
import {
    buildTestFilter,
    CapabilityProbe,
    TraitMapping,
} from './capability';
import {
    versionSuffix,
} from './config';
import {
    fileSet,
    findDirectories,
    findSingleFile,
} from './discovery';
import {
    TaskRegistry,
} from './registry';
import {
    createEachTask,
    createTask,
    TaskContext,
} from './task';
import fs = require('fs-extra');
import path = require('path');

/** Probes for the capabilities the test projects care about. */
export const CAPABILITY_PROBES: readonly CapabilityProbe[] = [
    {args: ['version'], command: 'docker', name: 'docker'},
    {args: ['--list-sdks'], command: 'dotnet', name: 'dotnet-run'},
];

/** Test traits marking tests that need a capability. */
export const TEST_TRAITS: readonly TraitMapping[] = [
    {capability: 'docker', trait: 'IsUsingDocker'},
    {capability: 'dotnet-run', trait: 'IsUsingDotnetRun'},
];

/**
 * Options for {@link registerPipeline}.
 */
export interface PipelineOptions {
    /** Solution directory. Default: the current directory. */
    cwd?: string;
    /** Default: `Tests/**\/*.csproj`. */
    testProjects?: string | string[];
    /** Must match exactly one project. Default: `Source/**\/*.csproj`. */
    packProject?: string | string[];
    /** Default: {@link TEST_TRAITS}. */
    traits?: readonly TraitMapping[];
    /** Password protecting the exported developer certificate. */
    certificatePassword?: string;
    /** Default: `dotnet`. */
    dotnet?: string;
}

/**
 * Registers the pipeline tasks:
 * `Clean`, `Restore`, `Build`, `InstallDeveloperCertificate`, `Test`, `Pack` and `Default`, each depending on the
 * one before.
 */
export function registerPipeline(registry: TaskRegistry, options: PipelineOptions = {}): void {
    const cwd = path.resolve(options.cwd || '.');
    const dotnet = options.dotnet || 'dotnet';
    const traits = options.traits || TEST_TRAITS;
    const certificatePassword = options.certificatePassword || 'depbuild';
    const artifacts = (ctx: TaskContext) => path.resolve(cwd, ctx.settings.artifactsDir);
    const suffixArgs = (ctx: TaskContext) => {
        const suffix = versionSuffix(ctx.settings);
        return suffix ? ['--version-suffix', suffix] : [];
    };

    registry.register(createTask({
        action: async ctx => {
            await fs.emptyDir(artifacts(ctx));
            for (const dir of await findDirectories(['**/bin', '**/obj'], {cwd})) {
                ctx.logger.debug({dir}, 'removing build output');
                await fs.remove(path.join(cwd, dir));
            }
        },
        description: 'Cleans the artifacts, bin and obj directories.',
        name: 'Clean',
    }));

    registry.register(createTask({
        action: async ctx => {
            await ctx.invoke(dotnet, ['restore'], {cwd});
        },
        dependencies: ['Clean'],
        description: 'Restores NuGet packages.',
        name: 'Restore',
    }));

    registry.register(createTask({
        action: async ctx => {
            await ctx.invoke(dotnet, [
                'build', '.',
                '--configuration', ctx.settings.configuration,
                '--no-restore',
                ...suffixArgs(ctx),
            ], {cwd});
        },
        dependencies: ['Restore'],
        description: 'Builds the solution.',
        name: 'Build',
    }));

    registry.register(createTask({
        action: async ctx => {
            const certificate = path.join(artifacts(ctx), 'DeveloperCertificate.pfx');
            await ctx.invoke(dotnet, ['dev-certs', 'https', '--export-path', certificate, '--password', certificatePassword], {cwd});
            // Hosted CI agents cannot always write to the trust store.
            await ctx.invoke(dotnet, ['dev-certs', 'https', '--trust'], {
                cwd,
                tolerateFailure: () => ctx.settings.ciHost !== undefined,
            });
        },
        dependencies: ['Build'],
        description: 'Exports and trusts the HTTPS developer certificate used by container tests.',
        guard: ctx => ctx.capabilities.get('docker') === true,
        name: 'InstallDeveloperCertificate',
    }));

    registry.register(createEachTask({
        action: async (ctx: TaskContext, project: string) => {
            const filter = buildTestFilter(ctx.capabilities, traits);
            const name = path.basename(project, path.extname(project));
            await ctx.invoke(dotnet, [
                'test', project,
                '--configuration', ctx.settings.configuration,
                '--no-build',
                ...(filter ? ['--filter', filter] : []),
                '--logger', `trx;LogFileName=${name}.trx`,
                '--results-directory', artifacts(ctx),
            ], {cwd});
        },
        dependencies: ['InstallDeveloperCertificate'],
        description: 'Runs the test projects and writes the results to the artifacts directory.',
        items: fileSet(options.testProjects || 'Tests/**/*.csproj', {cwd}),
        name: 'Test',
    }));

    registry.register(createTask({
        action: async ctx => {
            const project = await findSingleFile(options.packProject || 'Source/**/*.csproj', {cwd});
            await ctx.invoke(dotnet, [
                'pack', project,
                '--configuration', ctx.settings.configuration,
                '--no-build',
                '--output', artifacts(ctx),
                ...suffixArgs(ctx),
            ], {cwd});
        },
        dependencies: ['Test'],
        description: 'Creates the NuGet package in the artifacts directory.',
        name: 'Pack',
    }));

    registry.register(createTask({
        dependencies: ['Pack'],
        description: 'Runs the whole pipeline.',
        name: 'Default',
    }));
}
