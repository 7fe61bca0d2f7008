import {
    suite,
    test,
} from '@testdeck/mocha';
import {
    pino,
} from 'pino';
import {
    BuildArguments,
    loadSettings,
} from './config';
import {
    run,
    RunResult,
} from './engine';
import {
    DiscoveryMismatchError,
    ProcessFailedError,
    TaskFailedError,
} from './errors';
import {
    InvokeOptions,
} from './invoke';
import {
    Progress,
} from './progress';
import {
    registerPipeline,
} from './pipeline';
import {
    resolveNames,
} from './resolve';
import {
    TaskRegistry,
} from './registry';
import assert = require('assert');
import fs = require('fs-extra');
import os = require('os');
import path = require('path');

interface Invocation {
    commandLine: string;
    cwd?: string;
    tolerated?: boolean;
}

const silentProgress: Progress = {
    render: () => undefined,
    status: '',
    unrender: () => undefined,
    write: () => undefined,
};

@suite('pipeline')
export class PipelineTest {
    private dir = '';
    private invocations: Invocation[] = [];

    async before(): Promise<void> {
        this.dir = await fs.mkdtemp(path.join(os.tmpdir(), 'depbuild-pipeline-'));
        await fs.outputFile(path.join(this.dir, 'Source/Lib/Lib.csproj'), '<Project />');
        await fs.outputFile(path.join(this.dir, 'Source/Lib/bin/Release/Lib.dll'), 'dll');
        await fs.outputFile(path.join(this.dir, 'Source/Lib/obj/project.assets.json'), '{}');
        await fs.outputFile(path.join(this.dir, 'Tests/Lib.Test/Lib.Test.csproj'), '<Project />');
        await fs.outputFile(path.join(this.dir, 'Tests/Web.Test/Web.Test.csproj'), '<Project />');
        await fs.outputFile(path.join(this.dir, 'Artifacts/stale.trx'), '');
    }

    async after(): Promise<void> {
        await fs.remove(this.dir);
    }

    private registry(): TaskRegistry {
        const registry = new TaskRegistry();
        registerPipeline(registry, {certificatePassword: 'test-secret', cwd: this.dir});
        return registry;
    }

    private run(target: string, args: BuildArguments, env: Record<string, string>, capabilities: [string, boolean][],
        failOn?: string): Promise<RunResult> {
        return run(this.registry(), target, {
            capabilities: new Map(capabilities),
            invoker: async (command: string, commandArgs: readonly string[] = [], options: InvokeOptions = {}) => {
                const commandLine = [command, ...commandArgs].join(' ');
                this.invocations.push({
                    commandLine,
                    cwd: options.cwd,
                    tolerated: options.tolerateFailure && options.tolerateFailure(),
                });
                if (failOn && commandLine.includes(failOn))
                    throw new ProcessFailedError(command, commandArgs, 1);
                return 0;
            },
            logger: pino({level: 'silent'}),
            progress: silentProgress,
            settings: loadSettings({...args, target}, env),
        });
    }

    @test
    'resolves the default target'(): void {
        assert.deepStrictEqual(resolveNames(this.registry(), 'Default'),
            ['Clean', 'Restore', 'Build', 'InstallDeveloperCertificate', 'Test', 'Pack', 'Default']);
    }

    @test
    async 'runs the pipeline without docker'(): Promise<void> {
        const result = await this.run('Default', {buildNumber: 7}, {}, [['docker', false], ['dotnet-run', true]]);
        const artifacts = path.join(this.dir, 'Artifacts');

        assert.deepStrictEqual(result.skipped, ['InstallDeveloperCertificate']);
        assert.deepStrictEqual(this.invocations.map(x => x.commandLine), [
            'dotnet restore',
            'dotnet build . --configuration Release --no-restore --version-suffix beta-0007',
            'dotnet test Tests/Lib.Test/Lib.Test.csproj --configuration Release --no-build --filter IsUsingDocker!=true ' +
                `--logger trx;LogFileName=Lib.Test.trx --results-directory ${artifacts}`,
            'dotnet test Tests/Web.Test/Web.Test.csproj --configuration Release --no-build --filter IsUsingDocker!=true ' +
                `--logger trx;LogFileName=Web.Test.trx --results-directory ${artifacts}`,
            `dotnet pack Source/Lib/Lib.csproj --configuration Release --no-build --output ${artifacts} --version-suffix beta-0007`,
        ]);
        assert(this.invocations.every(x => x.cwd === this.dir));
    }

    @test
    async 'Clean empties artifacts and removes bin and obj'(): Promise<void> {
        await this.run('Clean', {}, {}, []);
        assert.deepStrictEqual(await fs.readdir(path.join(this.dir, 'Artifacts')), []);
        assert(!await fs.pathExists(path.join(this.dir, 'Source/Lib/bin')));
        assert(!await fs.pathExists(path.join(this.dir, 'Source/Lib/obj')));
        assert(await fs.pathExists(path.join(this.dir, 'Source/Lib/Lib.csproj')));
    }

    @test
    async 'installs the developer certificate when docker is present'(): Promise<void> {
        await this.run('InstallDeveloperCertificate', {configuration: 'Debug', preReleaseSuffix: ''}, {}, [['docker', true]]);
        const certificate = path.join(this.dir, 'Artifacts', 'DeveloperCertificate.pfx');
        assert.deepStrictEqual(this.invocations, [
            {commandLine: 'dotnet restore', cwd: this.dir, tolerated: undefined},
            {commandLine: 'dotnet build . --configuration Debug --no-restore', cwd: this.dir, tolerated: undefined},
            {commandLine: `dotnet dev-certs https --export-path ${certificate} --password test-secret`, cwd: this.dir, tolerated: undefined},
            {commandLine: 'dotnet dev-certs https --trust', cwd: this.dir, tolerated: false},
        ]);
    }

    @test
    async 'tolerates certificate trust failures on CI'(): Promise<void> {
        await this.run('InstallDeveloperCertificate', {}, {TF_BUILD: 'True'}, [['docker', true]]);
        const trust = this.invocations[this.invocations.length - 1];
        assert.deepStrictEqual(trust, {commandLine: 'dotnet dev-certs https --trust', cwd: this.dir, tolerated: true});
    }

    @test
    async 'omits the filter when every capability is present'(): Promise<void> {
        await this.run('Test', {}, {}, [['docker', true], ['dotnet-run', true]]);
        const tests = this.invocations.filter(x => x.commandLine.startsWith('dotnet test'));
        assert.strictEqual(tests.length, 2);
        assert(tests.every(x => !x.commandLine.includes('--filter')));
    }

    @test
    async 'a failing test project stops the pipeline'(): Promise<void> {
        await assert.rejects(this.run('Default', {}, {}, [], 'Lib.Test.csproj'), (e: unknown) => {
            assert(e instanceof TaskFailedError);
            assert.strictEqual(e.taskName, 'Test');
            assert.strictEqual(e.item, 'Tests/Lib.Test/Lib.Test.csproj');
            return true;
        });
        const last = this.invocations[this.invocations.length - 1];
        assert(last.commandLine.startsWith('dotnet test Tests/Lib.Test/Lib.Test.csproj '));
        assert(!this.invocations.some(x => x.commandLine.startsWith('dotnet pack')));
    }

    @test
    async 'Pack needs exactly one project'(): Promise<void> {
        await fs.outputFile(path.join(this.dir, 'Source/Tool/Tool.csproj'), '<Project />');
        await assert.rejects(this.run('Pack', {}, {}, []), (e: unknown) => {
            assert(e instanceof TaskFailedError);
            assert.strictEqual(e.taskName, 'Pack');
            assert(e.cause instanceof DiscoveryMismatchError);
            assert.deepStrictEqual(e.cause.matches, ['Source/Lib/Lib.csproj', 'Source/Tool/Tool.csproj']);
            return true;
        });
    }
}
