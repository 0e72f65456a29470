import { Command } from 'commander';
import { WatchCommand } from './watch-command';

/**
 * Register the watch command
 */
export function registerWatchCommand(program: Command): void {
  const watchCommand = new WatchCommand();
  watchCommand.register(program);
}
