/**
 * Cloudreve CLI - Account and server information
 */

import { Command } from 'commander';
import { connect, formatBytes, getGlobalOptions, output, runAction } from './session.js';

export function registerUserCommand(program: Command): void {
  program
    .command('quota')
    .description('Show storage usage')
    .action(async (_options: Record<string, never>, command: Command) => {
      await runAction('Quota', async () => {
        const globals = getGlobalOptions(command);
        const { client } = await connect(globals);
        const quota = await client.getStorageQuota();

        output(globals, quota, () => {
          const percent = quota.total > 0 ? ((quota.used / quota.total) * 100).toFixed(1) : '0.0';
          console.log(`Used:  ${formatBytes(quota.used)} (${percent}%)`);
          console.log(`Total: ${formatBytes(quota.total)}`);
          console.log(`Free:  ${formatBytes(quota.free)}`);
        });
      });
    });

  program
    .command('server')
    .description('Show the server version and protocol')
    .action(async (_options: Record<string, never>, command: Command) => {
      await runAction('Server info', async () => {
        const globals = getGlobalOptions(command);
        const { client } = await connect(globals, { requireSession: false });
        const version = await client.getServerVersion();

        output(globals, { server: client.baseUrl, api: client.version, version }, () => {
          console.log(`Server:  ${client.baseUrl}`);
          console.log(`API:     ${client.version}`);
          console.log(`Version: ${version}`);
        });
      });
    });
}

export default registerUserCommand;
