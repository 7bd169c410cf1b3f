/**
 * Cloudreve CLI - Background tasks
 *
 * Remote downloads on both protocols; archive jobs on v4 servers.
 */

import { Command, Option } from 'commander';
import type { TaskCategory } from '../api/v4/types.js';
import type { TaskRecord } from '../client/models.js';
import { InvalidArgumentError } from '../errors/index.js';
import { connect, getGlobalOptions, output, runAction } from './session.js';

const TASK_CATEGORIES: readonly TaskCategory[] = ['general', 'downloading', 'downloaded'];

function toTaskCategory(value: string): TaskCategory {
  const category = TASK_CATEGORIES.find((candidate) => candidate === value);
  if (!category) {
    throw new InvalidArgumentError(`Unknown task category: ${value}`, { category: value });
  }
  return category;
}

export function formatTask(task: TaskRecord): string {
  const detail = task.error ? `  ${task.error}` : task.url ? `  ${task.url}` : '';
  return `${task.id}  ${task.status.padEnd(10)}  ${task.type}${detail}`;
}

function printTasks(tasks: TaskRecord[]): void {
  if (tasks.length === 0) {
    console.log('No tasks.');
  }
  for (const task of tasks) {
    console.log(formatTask(task));
  }
}

export function registerTasksCommand(program: Command): void {
  const tasksCmd = program.command('tasks').description('Manage background tasks');

  tasksCmd
    .command('list')
    .description('List tasks')
    .addOption(
      new Option('-c, --category <category>', 'Only one category').choices(TASK_CATEGORIES)
    )
    .action(async (options: { category?: string }, command: Command) => {
      await runAction('List tasks', async () => {
        const globals = getGlobalOptions(command);
        const { client } = await connect(globals);
        const category = options.category === undefined ? undefined : toTaskCategory(options.category);
        const tasks = await client.listTasks(category);
        output(globals, tasks, () => printTasks(tasks));
      });
    });

  tasksCmd
    .command('download')
    .description('Let the server download URLs into a folder')
    .argument('<dst>', 'Remote destination folder')
    .argument('<urls...>', 'URLs to fetch')
    .action(async (dst: string, urls: string[], _options: Record<string, never>, command: Command) => {
      await runAction('Remote download', async () => {
        const globals = getGlobalOptions(command);
        const { client } = await connect(globals);
        const tasks = await client.createRemoteDownload(urls, dst);
        output(globals, tasks, () => {
          console.log(`✓ Queued ${urls.length} download(s) into ${dst}`);
          for (const task of tasks) {
            console.log(formatTask(task));
          }
        });
      });
    });

  tasksCmd
    .command('cancel')
    .description('Cancel a task')
    .argument('<id>', 'Task id')
    .action(async (id: string, _options: Record<string, never>, command: Command) => {
      await runAction('Cancel task', async () => {
        const { client } = await connect(getGlobalOptions(command));
        await client.cancelTask(id);
        console.log(`✓ Cancelled task ${id}`);
      });
    });

  tasksCmd
    .command('archive')
    .description('Compress files into an archive (v4 servers)')
    .argument('<dst>', 'Remote archive path')
    .argument('<paths...>', 'Files and folders to include')
    .action(async (dst: string, paths: string[], _options: Record<string, never>, command: Command) => {
      await runAction('Archive', async () => {
        const globals = getGlobalOptions(command);
        const { client } = await connect(globals);
        const task = await client.createArchive(paths, dst);
        output(globals, task, () => console.log(formatTask(task)));
      });
    });

  tasksCmd
    .command('extract')
    .description('Extract an archive into a folder (v4 servers)')
    .argument('<src>', 'Remote archive')
    .argument('<dst>', 'Remote destination folder')
    .option('--encoding <name>', 'File name encoding inside the archive')
    .option('--password <password>', 'Archive password')
    .action(
      async (
        src: string,
        dst: string,
        options: { encoding?: string; password?: string },
        command: Command
      ) => {
        await runAction('Extract', async () => {
          const globals = getGlobalOptions(command);
          const { client } = await connect(globals);
          const task = await client.extractArchive(src, dst, options);
          output(globals, task, () => console.log(formatTask(task)));
        });
      }
    );
}

export default registerTasksCommand;
