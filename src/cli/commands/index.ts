// src/cli/commands/index.ts

import { registerClearCommand } from './clear.js';
import { registerHelpCommand } from './help.js';
import { registerHistoryCommand } from './history.js';
import { registerMemoryCommand } from './memory.js';
import { registerQuitCommand } from './quit.js';
import { registerReloadCommand } from './reload.js';
import { CommandRegistry } from './registry.js';

export { CommandRegistry, type Command, type CommandContext } from './registry.js';

export function createCommandRegistry(): CommandRegistry {
  const registry = new CommandRegistry();
  registerClearCommand(registry);
  registerMemoryCommand(registry);
  registerHistoryCommand(registry);
  registerReloadCommand(registry);
  registerHelpCommand(registry);
  registerQuitCommand(registry);
  return registry;
}
