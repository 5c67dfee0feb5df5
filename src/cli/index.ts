/**
 * CLI module, a thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export { registerAskCommand } from './ask.js';
export { registerRunCommand } from './batch.js';
