#!/usr/bin/env node

import { Command } from 'commander';
import { registerScanCommand } from './commands/scan/scan';
import { registerWatchCommand } from './commands/watch/watch';

const program = new Command();

program
  .name('unionmount')
  .description('Overlay several directory trees and report their union as it changes')
  .version('0.1.0');

registerScanCommand(program);
registerWatchCommand(program);

program.parseAsync().catch((error) => {
  console.error("❌ Fatal error:", error);
  process.exit(1);
});
