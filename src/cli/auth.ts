/**
 * Cloudreve CLI - Session commands
 *
 * login, logout and whoami. The session token is cached per server so later
 * commands run without credentials.
 */

import { Command } from 'commander';
import { input, password as passwordPrompt, confirm } from '@inquirer/prompts';
import { deleteStoredSession, hasStoredSession, storeSession } from '../credentials.js';
import { logger } from '../logger.js';
import { NotAuthenticatedError, TwoFactorRequiredError } from '../errors/index.js';
import type { LoginResponse } from '../client/models.js';
import { toAppError } from '../utils/error.js';
import { fromPromise } from '../utils/result.js';
import { validateTotpCode } from '../validation/auth.js';
import { connect, getGlobalOptions, output, resolveBaseUrl, runAction } from './session.js';

interface LoginOptions {
  username?: string;
  password?: string;
  code?: string;
  force?: boolean;
}

export function registerAuthCommand(program: Command): void {
  program
    .command('login')
    .description('Log in to the server and cache the session')
    .option('-u, --username <email>', 'Account e-mail')
    .option('-p, --password <password>', 'Password (prompted when omitted)')
    .option('--code <otp>', 'One-time code for two-factor accounts')
    .option('-f, --force', 'Replace a cached session without asking')
    .action(async (options: LoginOptions, command: Command) => {
      await runAction('Login', async () => {
        const globals = getGlobalOptions(command);
        const baseUrl = resolveBaseUrl(globals);

        if (!options.force && (await hasStoredSession(baseUrl))) {
          const overwrite = await confirm({
            message: `You are already logged in to ${baseUrl}. Log in again?`,
            default: false,
          });
          if (!overwrite) {
            console.log('Login cancelled.');
            return;
          }
        }

        const { client } = await connect(globals, { restore: false, requireSession: false });

        const account =
          options.username ??
          (await input({
            message: 'E-mail:',
            validate: (value) => value.trim().length > 0 || 'E-mail is required',
          }));
        const password =
          options.password ?? (await passwordPrompt({ message: 'Password:', mask: '*' }));

        let response: LoginResponse;
        try {
          response = await client.login(account.trim(), password);
        } catch (error) {
          if (!(error instanceof TwoFactorRequiredError)) throw error;
          const code =
            options.code ??
            (await input({
              message: 'One-time code:',
              validate: (value) => validateTotpCode(value).ok || 'Enter the 6-8 digit code',
            }));
          response = await client.loginTwoFactor(code);
        }

        const token = client.getToken();
        if (!token) {
          throw new NotAuthenticatedError('The server did not return a session');
        }

        await storeSession({
          baseUrl: client.baseUrl,
          apiVersion: client.version,
          token: token.token,
          refreshToken: token.version === 'v4' ? token.refreshToken : undefined,
          account: account.trim(),
          userId: response.version === 'v4' ? response.user.id : undefined,
        });

        const name = response.user.nickname || response.user.email || account.trim();
        output(globals, { account: account.trim(), user: response.user, version: client.version }, () => {
          console.log(`✓ Logged in as ${name} (${client.version} API)`);
        });
        logger.info(`Logged in to ${client.baseUrl} as ${account.trim()}`);
      });
    });

  program
    .command('logout')
    .description('End the session and remove it from the cache')
    .action(async (_options: Record<string, never>, command: Command) => {
      await runAction('Logout', async () => {
        const globals = getGlobalOptions(command);
        const baseUrl = resolveBaseUrl(globals);

        if (!(await hasStoredSession(baseUrl))) {
          console.log('You are not logged in.');
          return;
        }

        const { client } = await connect(globals);
        const remote = await fromPromise(() => client.logout(), toAppError);
        if (!remote.ok) {
          logger.warn(`Server logout failed: ${remote.error.message}`);
        }

        await deleteStoredSession(baseUrl);
        console.log('✓ Logged out. Cached session removed.');
        logger.info(`Logged out of ${baseUrl}`);
      });
    });

  program
    .command('whoami')
    .description('Show the logged-in account')
    .action(async (_options: Record<string, never>, command: Command) => {
      await runAction('whoami', async () => {
        const globals = getGlobalOptions(command);
        const { client, session } = await connect(globals);
        const account = session?.account ?? '';

        output(globals, { account, server: client.baseUrl, version: client.version }, () => {
          console.log(`Logged in as ${account} on ${client.baseUrl} (${client.version} API)`);
        });
      });
    });
}

export default registerAuthCommand;
