#!/usr/bin/env node
import { createInterface } from 'node:readline/promises';
import { Command } from 'commander';
import {
  addTask,
  createContext,
  doctor,
  editTask,
  exitCodeFor,
  listFile,
  moveTask,
  newSession,
  removeTask,
  toggleTask,
} from './commands.js';
import { errorMessage } from './errors.js';
import { LineReader } from './lineReader.js';
import { PromptFilePicker } from './picker/prompt.js';
import { Shell, runShell } from './shell.js';

const context = () => createContext(process.env, { isTTY: process.stdout.isTTY });

const program = new Command();

program
  .name('todo-desk')
  .description('Keep an ordered to-do list in a JSON file')
  .version('0.1.0');

program
  .command('doctor')
  .description('Print the resolved configuration')
  .action(() => {
    doctor(context());
  });

program
  .command('list')
  .description('Show the tasks in a file')
  .argument('<file>', 'task file')
  .option('--format <format>', 'Output format: pretty|json', 'pretty')
  .action(async (file: string, opts: { format?: string }) => {
    await listFile(context(), file, opts.format);
  });

program
  .command('add')
  .description('Append a task (creates the file if needed)')
  .argument('<file>', 'task file')
  .argument('<text...>', 'task description')
  .action(async (file: string, text: string[]) => {
    await addTask(context(), file, text);
  });

program
  .command('toggle')
  .description('Mark a task done or not done')
  .argument('<file>', 'task file')
  .argument('<id>', 'task id')
  .action(async (file: string, id: string) => {
    await toggleTask(context(), file, id);
  });

program
  .command('edit')
  .description('Replace the description of a task')
  .argument('<file>', 'task file')
  .argument('<id>', 'task id')
  .argument('[text...]', 'new description (empty clears it)')
  .action(async (file: string, id: string, text: string[] | undefined) => {
    await editTask(context(), file, id, text);
  });

program
  .command('rm')
  .description('Delete a task')
  .argument('<file>', 'task file')
  .argument('<id>', 'task id')
  .action(async (file: string, id: string) => {
    await removeTask(context(), file, id);
  });

program
  .command('move')
  .description('Move a task to a position (1-based)')
  .argument('<file>', 'task file')
  .argument('<id>', 'task id')
  .argument('<pos>', 'new position')
  .action(async (file: string, id: string, pos: string) => {
    await moveTask(context(), file, id, pos);
  });

program
  .command('shell')
  .description('Interactive session')
  .argument('[file]', 'task file to open first')
  .action(async (file: string | undefined) => {
    const ctx = context();
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    const reader = new LineReader(rl, (text) => process.stdout.write(text));
    const session = newSession(ctx, new PromptFilePicker(reader));

    if (file) {
      const loaded = await session.openFrom(file);
      if (!loaded.ok) console.error(`error: ${loaded.error.message}`);
    }

    try {
      await runShell(new Shell(session, { color: ctx.color }), reader, ctx.write);
    } finally {
      rl.close();
    }
  });

program.parseAsync(process.argv).catch((err) => {
  console.error(`error: ${errorMessage(err)}`);
  process.exitCode = exitCodeFor(err);
});
