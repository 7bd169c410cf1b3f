/**
 * Cloudreve CLI - File commands
 */

import { Command } from 'commander';
import { confirm } from '@inquirer/prompts';
import { readFile } from 'fs/promises';
import { basename } from 'path';
import { getConfig } from '../config.js';
import type { FileEntry, FileList } from '../client/models.js';
import { joinPath } from '../validation/path.js';
import {
  connect,
  formatBytes,
  getGlobalOptions,
  output,
  parsePositiveInt,
  runAction,
} from './session.js';

interface ListCommandOptions {
  all?: boolean;
  page?: number;
  pageSize?: number;
}

/**
 * One listing line: kind, size, modification time, name
 *
 * @example
 * formatEntry(folder); // 'd          -  2024-01-02 10:00:00  photos/'
 */
export function formatEntry(entry: FileEntry): string {
  const kind = entry.isFolder ? 'd' : '-';
  const size = entry.isFolder ? '-' : formatBytes(entry.size);
  const name = entry.isFolder ? `${entry.name}/` : entry.name;
  return `${kind} ${size.padStart(10)}  ${entry.updatedAt}  ${name}`;
}

function printListing(listing: FileList): void {
  if (listing.entries.length === 0) {
    console.log('(empty)');
  }
  for (const entry of listing.entries) {
    console.log(formatEntry(entry));
  }
  if (listing.version === 'v4') {
    const { pagination } = listing;
    const hasMore = pagination.isCursor
      ? pagination.nextToken !== undefined
      : pagination.totalItems !== undefined &&
        pagination.page * pagination.pageSize < pagination.totalItems;
    if (hasMore) {
      console.log('-- more entries available; use --page or --all --');
    }
  }
}

export function registerFilesCommand(program: Command): void {
  program
    .command('ls')
    .description('List a directory')
    .argument('[path]', 'Remote directory', '/')
    .option('-a, --all', 'Fetch every page')
    .option('--page <n>', 'Page to show (1-based)', parsePositiveInt)
    .option('--page-size <n>', 'Entries per page', parsePositiveInt)
    .action(async (path: string, options: ListCommandOptions, command: Command) => {
      await runAction('List', async () => {
        const globals = getGlobalOptions(command);
        const { client } = await connect(globals);
        const pageSize = options.pageSize ?? getConfig().pageSize;

        const listing = options.all
          ? await client.listFilesAll(path, pageSize)
          : await client.listFiles(path, { page: options.page, pageSize });

        output(globals, listing.entries, () => printListing(listing));
      });
    });

  program
    .command('info')
    .description('Show details of a file or folder')
    .argument('<path>', 'Remote path')
    .action(async (path: string, _options: Record<string, never>, command: Command) => {
      await runAction('Info', async () => {
        const globals = getGlobalOptions(command);
        const { client } = await connect(globals);
        const info = await client.getFileInfo(path);

        output(globals, info, () => {
          console.log(`Path:     ${info.path}`);
          console.log(`Type:     ${info.isFolder ? 'folder' : 'file'}`);
          console.log(`Size:     ${formatBytes(info.size)}`);
          console.log(`Created:  ${info.createdAt}`);
          console.log(`Modified: ${info.updatedAt}`);
          if (info.policy) console.log(`Policy:   ${info.policy}`);
        });
      });
    });

  program
    .command('mkdir')
    .description('Create a directory')
    .argument('<path>', 'Remote directory')
    .action(async (path: string, _options: Record<string, never>, command: Command) => {
      await runAction('mkdir', async () => {
        const { client } = await connect(getGlobalOptions(command));
        await client.createDirectory(path);
        console.log(`✓ Created ${path}`);
      });
    });

  program
    .command('rm')
    .description('Delete files or folders')
    .argument('<paths...>', 'Remote paths')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(async (paths: string[], options: { yes?: boolean }, command: Command) => {
      await runAction('Delete', async () => {
        const globals = getGlobalOptions(command);

        if (!options.yes) {
          const confirmed = await confirm({
            message: `Delete ${paths.length} item(s)?`,
            default: false,
          });
          if (!confirmed) {
            console.log('Delete cancelled.');
            return;
          }
        }

        const { client } = await connect(globals);
        const result = await client.batchDelete(paths);

        output(globals, result, () => {
          console.log(`✓ Deleted ${result.deleted} item(s)`);
          for (const [path, message] of result.errors) {
            console.error(`✗ ${path}: ${message}`);
          }
        });
        if (result.failed > 0) {
          process.exitCode = 1;
        }
      });
    });

  program
    .command('mv')
    .description('Move or rename a file or folder')
    .argument('<src>', 'Source path')
    .argument('<dest>', 'Destination path')
    .action(async (src: string, dest: string, _options: Record<string, never>, command: Command) => {
      await runAction('Move', async () => {
        const { client } = await connect(getGlobalOptions(command));
        await client.move(src, dest);
        console.log(`✓ Moved ${src} -> ${dest}`);
      });
    });

  program
    .command('cp')
    .description('Copy a file or folder')
    .argument('<src>', 'Source path')
    .argument('<dest>', 'Destination path')
    .action(async (src: string, dest: string, _options: Record<string, never>, command: Command) => {
      await runAction('Copy', async () => {
        const { client } = await connect(getGlobalOptions(command));
        await client.copy(src, dest);
        console.log(`✓ Copied ${src} -> ${dest}`);
      });
    });

  program
    .command('rename')
    .description('Rename a file or folder in place')
    .argument('<path>', 'Remote path')
    .argument('<name>', 'New name')
    .action(async (path: string, name: string, _options: Record<string, never>, command: Command) => {
      await runAction('Rename', async () => {
        const { client } = await connect(getGlobalOptions(command));
        await client.rename(path, name);
        console.log(`✓ Renamed ${path} to ${name}`);
      });
    });

  program
    .command('restore')
    .description('Restore files from the trash (v4 servers)')
    .argument('<paths...>', 'Trashed paths')
    .action(async (paths: string[], _options: Record<string, never>, command: Command) => {
      await runAction('Restore', async () => {
        const { client } = await connect(getGlobalOptions(command));
        await client.restore(paths);
        console.log(`✓ Restored ${paths.length} item(s)`);
      });
    });

  program
    .command('upload')
    .description('Upload a local file')
    .argument('<local>', 'Local file')
    .argument('<remote>', 'Remote path, or a directory ending in "/"')
    .option('--policy <id>', 'Storage policy id')
    .action(
      async (local: string, remote: string, options: { policy?: string }, command: Command) => {
        await runAction('Upload', async () => {
          const { client } = await connect(getGlobalOptions(command));
          const target = remote.endsWith('/') ? joinPath(remote, basename(local)) : remote;
          const data = await readFile(local);
          await client.upload(target, data, options.policy);
          console.log(`✓ Uploaded ${local} -> ${target} (${formatBytes(data.byteLength)})`);
        });
      }
    );

  program
    .command('download-url')
    .description('Print a download URL for a file')
    .argument('<path>', 'Remote file')
    .action(async (path: string, _options: Record<string, never>, command: Command) => {
      await runAction('Download', async () => {
        const globals = getGlobalOptions(command);
        const { client } = await connect(globals);
        const url = await client.download(path);
        output(globals, { url }, () => console.log(url));
      });
    });
}

export default registerFilesCommand;
