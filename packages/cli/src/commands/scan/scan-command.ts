import { Command } from 'commander';
import { serializeChange } from '@unionmount/core';
import type { SerializedChange } from '@unionmount/core';
import { BaseCommand } from '../../base/base-command';
import type { MountCommandOptions } from '../../interfaces/command';
import { formatChange, overlaidPaths } from '../../services/change-formatter';
import { resolveMountSettings } from '../../services/mount-settings';

export type ScanCommandOptions = MountCommandOptions;

export interface ScanResult {
  sources: string[];
  trackedPaths: number;
  overlaid: string[];
  change: SerializedChange;
}

/**
 * Scan Command - lists what the union mount sees right now
 *
 * Runs the initial scan only and stops before any watcher is started.
 */
export class ScanCommand extends BaseCommand<ScanCommandOptions> {
  protected commandName = 'scan';
  protected description = 'Print the initial union of all sources and exit';

  register(program: Command): void {
    this.withMountOptions(program.command(this.commandName).description(this.description))
      .action(async (options: ScanCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: ScanCommandOptions): Promise<void> {
    try {
      const config = await resolveMountSettings(options, process.cwd());
      const mount = this.container.createUnionMount(config);
      const controller = new AbortController();

      let initial: SerializedChange = {};
      await mount.run((change) => {
        initial = serializeChange(change);
        controller.abort();
      }, controller.signal);

      const status = mount.getStatus();
      const result: ScanResult = {
        sources: status.sources,
        trackedPaths: status.trackedPaths,
        overlaid: overlaidPaths(initial),
        change: initial,
      };

      if (!options.json && !options.quiet) {
        for (const line of formatChange(initial)) {
          this.logger.log(line);
        }
      }
      this.handleSuccess(
        result,
        options,
        `Scanned ${result.sources.length} sources: ${result.trackedPaths} paths, ${result.overlaid.length} overlaid`
      );
    } catch (error) {
      this.handleError(
        `Scan failed: ${error instanceof Error ? error.message : String(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }
}
