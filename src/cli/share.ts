/**
 * Cloudreve CLI - Share links and WebDAV accounts
 */

import { Command } from 'commander';
import type { DavAccountInput } from '../client/CloudreveClient.js';
import { connect, getGlobalOptions, output, parsePositiveInt, runAction } from './session.js';

interface ShareCreateOptions {
  password?: string;
  expires?: number;
}

interface DavCreateOptions {
  readonly?: boolean;
  proxy?: boolean;
}

interface DavUpdateOptions extends DavCreateOptions {
  name?: string;
  root?: string;
}

export function registerShareCommand(program: Command): void {
  const shareCmd = program.command('share').description('Manage share links');

  shareCmd
    .command('create')
    .description('Share a file or folder')
    .argument('<path>', 'Remote path')
    .option('--password <password>', 'Protect the link with a password')
    .option('--expires <seconds>', 'Link lifetime in seconds', parsePositiveInt)
    .action(async (path: string, options: ShareCreateOptions, command: Command) => {
      await runAction('Share', async () => {
        const globals = getGlobalOptions(command);
        const { client } = await connect(globals);
        const share = await client.createShare(path, {
          password: options.password,
          expires: options.expires,
        });
        output(globals, share, () => console.log(share.url));
      });
    });

  shareCmd
    .command('list')
    .description('List share links')
    .action(async (_options: Record<string, never>, command: Command) => {
      await runAction('List shares', async () => {
        const globals = getGlobalOptions(command);
        const { client } = await connect(globals);
        const shares = await client.listShares();

        output(globals, shares, () => {
          if (shares.length === 0) {
            console.log('No share links.');
          }
          for (const share of shares) {
            const state = share.expired ? ' (expired)' : '';
            console.log(`${share.id}  ${share.name}  ${share.url}${state}`);
          }
        });
      });
    });

  shareCmd
    .command('delete')
    .description('Delete a share link')
    .argument('<id>', 'Share id')
    .action(async (id: string, _options: Record<string, never>, command: Command) => {
      await runAction('Delete share', async () => {
        const { client } = await connect(getGlobalOptions(command));
        await client.deleteShare(id);
        console.log(`✓ Deleted share ${id}`);
      });
    });
}

export function registerDavCommand(program: Command): void {
  const davCmd = program.command('dav').description('Manage WebDAV accounts');

  davCmd
    .command('list')
    .description('List WebDAV accounts')
    .action(async (_options: Record<string, never>, command: Command) => {
      await runAction('List WebDAV accounts', async () => {
        const globals = getGlobalOptions(command);
        const { client } = await connect(globals);
        const accounts = await client.listDavAccounts();

        output(globals, accounts, () => {
          if (accounts.length === 0) {
            console.log('No WebDAV accounts.');
          }
          for (const account of accounts) {
            console.log(`${account.id}  ${account.name}  ${account.root}  ${account.password}`);
          }
        });
      });
    });

  davCmd
    .command('create')
    .description('Create a WebDAV account')
    .argument('<name>', 'Account name')
    .argument('[root]', 'Folder to expose', '/')
    .option('--readonly', 'Read-only access')
    .option('--proxy', 'Proxy downloads through the server')
    .action(async (name: string, root: string, options: DavCreateOptions, command: Command) => {
      await runAction('Create WebDAV account', async () => {
        const globals = getGlobalOptions(command);
        const { client } = await connect(globals);
        const account = await client.createDavAccount({
          name,
          root,
          readonly: options.readonly,
          proxy: options.proxy,
        });
        output(globals, account, () => {
          console.log(`✓ Created WebDAV account ${account.name} (${account.id})`);
          console.log(`  Password: ${account.password}`);
        });
      });
    });

  davCmd
    .command('update')
    .description('Update a WebDAV account')
    .argument('<id>', 'Account id')
    .option('--name <name>', 'New name')
    .option('--root <path>', 'New folder to expose')
    .option('--readonly', 'Read-only access')
    .option('--proxy', 'Proxy downloads through the server')
    .action(async (id: string, options: DavUpdateOptions, command: Command) => {
      await runAction('Update WebDAV account', async () => {
        const globals = getGlobalOptions(command);
        const { client } = await connect(globals);
        const changes: Partial<DavAccountInput> = {
          name: options.name,
          root: options.root,
          readonly: options.readonly,
          proxy: options.proxy,
        };
        const account = await client.updateDavAccount(id, changes);
        output(globals, account, () => console.log(`✓ Updated WebDAV account ${account.id}`));
      });
    });

  davCmd
    .command('delete')
    .description('Delete a WebDAV account')
    .argument('<id>', 'Account id')
    .action(async (id: string, _options: Record<string, never>, command: Command) => {
      await runAction('Delete WebDAV account', async () => {
        const { client } = await connect(getGlobalOptions(command));
        await client.deleteDavAccount(id);
        console.log(`✓ Deleted WebDAV account ${id}`);
      });
    });
}
