/**
 * Cloudreve CLI - CLI Module
 *
 * Re-exports CLI command registration functions.
 */

export { registerAuthCommand } from './auth.js';
export { registerFilesCommand } from './files.js';
export { registerShareCommand, registerDavCommand } from './share.js';
export { registerUserCommand } from './user.js';
export { registerTasksCommand } from './tasks.js';
export { registerConfigCommand } from './config.js';
