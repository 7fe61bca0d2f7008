import {
    suite,
    test,
} from '@testdeck/mocha';
import {
    pino,
} from 'pino';
import {
    createEachTask,
    DuplicateTaskError,
    loadSettings,
    newBuilder,
    Progress,
} from './index';
import assert = require('assert');

const silentProgress: Progress = {
    render: () => undefined,
    status: '',
    unrender: () => undefined,
    write: () => undefined,
};

@suite('Builder')
export class BuilderTest {
    @test
    async 'addTask() accepts definitions and tasks'(): Promise<void> {
        const ran: string[] = [];
        const builder = newBuilder();
        builder.addTask({action: () => { ran.push('restore'); }, name: 'Restore'});
        builder.addTask(createEachTask({
            action: (_ctx, project: string) => { ran.push(`test ${project}`); },
            dependencies: ['Restore'],
            items: () => ['a.csproj', 'b.csproj'],
            name: 'Test',
        }));

        assert.deepStrictEqual(builder.tasks().map(task => task.name), ['Restore', 'Test']);
        assert.deepStrictEqual(builder.resolve('Test'), ['Restore', 'Test']);

        const result = await builder.run('Test', {
            logger: pino({level: 'silent'}),
            progress: silentProgress,
            settings: loadSettings({}, {}),
        });
        assert.deepStrictEqual(result.executed, ['Restore', 'Test']);
        assert.deepStrictEqual(ran, ['restore', 'test a.csproj', 'test b.csproj']);
    }

    @test
    'addTask() rejects duplicates'(): void {
        const builder = newBuilder();
        builder.addTask({name: 'Build'});
        assert.throws(() => builder.addTask({name: 'Build'}), DuplicateTaskError);
    }
}
