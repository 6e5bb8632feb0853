import { defineApp, defineCommand } from '@/core/command';
import type { Context } from '@/core/context';
import { defineFlag } from '@/core/flag';
import type { Action } from '@/types';

/**
 * Sample command tree shared by the dispatch and help tests.
 * Actions record the contexts they were called with.
 */
export function createSampleApp(overrides: { rootAction?: Action } = {}) {
  const calls: { command: string; context: Context }[] = [];
  const record =
    (command: string): Action =>
    (context) => {
      calls.push({ command, context });
    };

  const hello = defineCommand({
    name: 'hello',
    aliases: ['hi'],
    description: 'Say hello',
    usage: 'cli hello [name]',
    flags: [
      defineFlag({ name: 'bye', type: 'bool', aliases: ['b'], description: 'Say bye instead' }),
      defineFlag({ name: 'age', type: 'int', aliases: ['a'], description: 'Age of the person' }),
    ],
    action: record('hello'),
  });

  const add = defineCommand({
    name: 'add',
    description: 'Add a remote',
    flags: [defineFlag({ name: 'verbose', type: 'int' })],
    action: record('remote add'),
  });

  const remote = defineCommand({
    name: 'remote',
    description: 'Manage remotes',
    commands: [add],
  });

  const serve = defineCommand({
    name: 'serve',
    flags: [defineFlag({ name: 'host', type: 'string', aliases: ['h'] })],
    action: record('serve'),
  });

  const app = defineApp({
    name: 'cli',
    version: '1.0.0',
    author: 'Test Author',
    description: 'Greets people',
    usage: 'cli [command] [args]',
    flags: [
      defineFlag({ name: 'verbose', type: 'bool', aliases: ['v'], description: 'Verbose output' }),
    ],
    commands: [hello, remote, serve],
    action: overrides.rootAction ?? record('cli'),
  });

  return { app, hello, remote, add, serve, calls };
}
