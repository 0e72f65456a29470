import { Command } from 'commander';
import { serializeChange } from '@unionmount/core';
import type { Change } from '@unionmount/core';
import { BaseCommand } from '../../base/base-command';
import type { MountCommandOptions } from '../../interfaces/command';
import { formatChange } from '../../services/change-formatter';
import { resolveMountSettings } from '../../services/mount-settings';

export type WatchCommandOptions = MountCommandOptions;

const STOP_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Watch Command - prints the initial union, then every change batch
 *
 * With `--json` each batch is printed as one JSON line.
 */
export class WatchCommand extends BaseCommand<WatchCommandOptions> {
  protected commandName = 'watch';
  protected description = 'Print the union of all sources, then every change until interrupted';

  register(program: Command): void {
    this.withMountOptions(program.command(this.commandName).description(this.description))
      .action(async (options: WatchCommandOptions) => {
        await this.execute(options);
      });
  }

  /**
   * Runs until SIGINT/SIGTERM, or until `signal` aborts.
   */
  async execute(options: WatchCommandOptions, signal?: AbortSignal): Promise<void> {
    const controller = new AbortController();
    const stop = () => controller.abort();
    signal?.addEventListener('abort', stop, { once: true });
    for (const name of STOP_SIGNALS) {
      process.once(name, stop);
    }

    try {
      const config = await resolveMountSettings(options, process.cwd());
      const mount = this.container.createUnionMount(config);

      await mount.run((change) => this.printBatch(change, options), controller.signal);

      if (!options.json && !options.quiet) {
        this.logger.log(`✅ Stopped after ${mount.getStatus().batchesDelivered} batches`);
      }
    } catch (error) {
      this.handleError(
        `Watch failed: ${error instanceof Error ? error.message : String(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    } finally {
      signal?.removeEventListener('abort', stop);
      for (const name of STOP_SIGNALS) {
        process.off(name, stop);
      }
    }
  }

  private printBatch(change: Change<string, string>, options: WatchCommandOptions): void {
    const serialized = serializeChange(change);
    if (options.json) {
      this.logger.log(JSON.stringify(serialized));
      return;
    }
    if (options.quiet) return;
    for (const line of formatChange(serialized)) {
      this.logger.log(line);
    }
  }
}
