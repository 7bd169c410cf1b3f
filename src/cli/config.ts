/**
 * Cloudreve CLI - Config CLI Command
 *
 * Manage configuration settings.
 */

import { Command } from 'commander';
import { confirm, input, select } from '@inquirer/prompts';
import { existsSync, unlinkSync } from 'fs';
import {
  CONFIG_KEYS,
  getConfigFilePath,
  loadConfig,
  setConfigValue,
  updateConfig,
  validateServerConfig,
} from '../config.js';
import { getConsoleLevel, getLogFilePath, logger } from '../logger.js';
import { listStoredSessions } from '../credentials.js';
import { validateBaseUrl, validatePositiveInt } from '../validation/config.js';
import { getGlobalOptions, printJson, runAction } from './session.js';

export function registerConfigCommand(program: Command): void {
  const configCmd = program.command('config').description('Manage configuration settings');

  // Show current config
  configCmd
    .command('show')
    .description('Show current configuration')
    .action(async (_options: Record<string, never>, command: Command) => {
      await runAction('Show config', async () => {
        const config = loadConfig();
        const sessions = await listStoredSessions();

        if (getGlobalOptions(command).json) {
          printJson(config);
          return;
        }

        console.log('Current Configuration');
        console.log('=====================\n');
        console.log('Server:');
        console.log(`  URL: ${config.server.baseUrl || '(not set)'}`);
        console.log(`  API: ${config.server.apiVersion}`);
        console.log(`  Timeout: ${config.server.timeoutMs}ms`);
        console.log();
        console.log('Listing:');
        console.log(`  Page Size: ${config.pageSize}`);
        console.log();
        console.log('Other:');
        console.log(`  Debug: ${config.debug}`);
        console.log(`  Cached Sessions: ${sessions.length}`);
        console.log();
        console.log(`Config file: ${getConfigFilePath()}`);
        console.log(`Log file: ${getLogFilePath()} (console level: ${getConsoleLevel()})`);
      });
    });

  // Set a config value
  configCmd
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', `Configuration key (${CONFIG_KEYS.join(', ')})`)
    .argument('<value>', 'Value to set')
    .action(async (key: string, value: string) => {
      await runAction('Set config', async () => {
        loadConfig();
        const result = setConfigValue(key, value);
        if (!result.ok) {
          throw result.error;
        }
        console.log(`✓ Set ${key} = ${value}`);
        logger.info(`Config updated: ${key} = ${value}`);
      });
    });

  // Interactive setup wizard
  configCmd
    .command('setup')
    .description('Interactive configuration setup')
    .action(async () => {
      await runAction('Setup', async () => {
        console.log('Cloudreve CLI Configuration\n');

        const config = loadConfig();

        const baseUrl = await input({
          message: 'Server URL:',
          default: config.server.baseUrl || undefined,
          validate: (value) => {
            const result = validateBaseUrl(value);
            return result.ok || result.error.message;
          },
        });

        const apiVersion = await select({
          message: 'API version:',
          default: config.server.apiVersion,
          choices: [
            { name: 'Detect automatically', value: 'auto' as const },
            { name: 'v4 (Cloudreve 4.x)', value: 'v4' as const },
            { name: 'v3 (Cloudreve 3.x)', value: 'v3' as const },
          ],
        });

        const pageSize = await input({
          message: 'Entries per page:',
          default: String(config.pageSize),
          validate: (value) => {
            const result = validatePositiveInt(value, 'pageSize');
            return result.ok || result.error.message;
          },
        });

        const debug = await confirm({
          message: 'Enable debug logging?',
          default: config.debug,
        });

        const url = validateBaseUrl(baseUrl);
        const server = { ...config.server, baseUrl: url.ok ? url.value : '', apiVersion };

        const errors = validateServerConfig(server);
        if (errors.length > 0) {
          console.log('\n⚠ Configuration warnings:');
          for (const message of errors) {
            console.log(`  - ${message}`);
          }

          const proceed = await confirm({
            message: 'Save configuration anyway?',
            default: false,
          });

          if (!proceed) {
            console.log('Configuration cancelled.');
            return;
          }
        }

        updateConfig({ server, pageSize: Number(pageSize), debug });
        console.log('\n✓ Configuration saved successfully.');
        console.log(`Config file: ${getConfigFilePath()}`);
        console.log(`Log file: ${getLogFilePath()} (console level: ${getConsoleLevel()})`);

        logger.info('Configuration updated via setup wizard');
      });
    });

  // Reset to defaults
  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .action(async () => {
      await runAction('Reset', async () => {
        const confirmed = await confirm({
          message: 'Reset all configuration to defaults?',
          default: false,
        });

        if (!confirmed) {
          console.log('Reset cancelled.');
          return;
        }

        const configPath = getConfigFilePath();
        if (existsSync(configPath)) {
          unlinkSync(configPath);
        }

        loadConfig(); // This will create default config
        console.log('✓ Configuration reset to defaults.');
        logger.info('Configuration reset to defaults');
      });
    });
}

export default registerConfigCommand;
