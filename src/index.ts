#!/usr/bin/env node

/**
 * Cloudreve CLI - Entry Point
 *
 * Command-line client for Cloudreve servers speaking the v3 or v4 API.
 */

import { Command } from 'commander';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import {
  registerAuthCommand,
  registerConfigCommand,
  registerDavCommand,
  registerFilesCommand,
  registerShareCommand,
  registerTasksCommand,
  registerUserCommand,
} from './cli/index.js';
import { loadConfig } from './config.js';
import { setDebugMode } from './logger.js';

export function buildProgram(): Command {
  // Load configuration
  const config = loadConfig();
  if (config.debug) {
    setDebugMode(true);
  }

  const program = new Command();

  // Program setup
  program
    .name('cloudreve-cli')
    .description('Command-line client for Cloudreve file servers (v3 and v4 API)')
    .version('0.1.0')
    .option('--debug', 'Enable debug logging')
    .option('-s, --server <url>', 'Server URL (overrides config)')
    .option('--api <version>', 'API version: auto, v3 or v4 (overrides config)')
    .option('--json', 'Print machine-readable JSON')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts();
      if (opts.debug) {
        setDebugMode(true);
      }
    });

  // Register commands
  registerAuthCommand(program);
  registerFilesCommand(program);
  registerShareCommand(program);
  registerDavCommand(program);
  registerUserCommand(program);
  registerTasksCommand(program);
  registerConfigCommand(program);

  return program;
}

/**
 * Whether `entry` (the script Node was started with) is this module. npm
 * installs the bin as a symlink, so both sides are compared as real paths.
 */
export function isEntryPoint(entry: string | undefined, moduleUrl: string): boolean {
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}

if (isEntryPoint(process.argv[1], import.meta.url)) {
  await buildProgram().parseAsync();
}
