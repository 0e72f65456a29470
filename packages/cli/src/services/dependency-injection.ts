import {
  ChokidarFileWatcher,
  createLogger,
  FsFileLister,
  UnionMountModule,
} from '@unionmount/core';
import type {
  ChokidarFileWatcherOptions,
  FileLister,
  FileWatcher,
  Logger,
  LogLevel,
  MountConfig,
} from '@unionmount/core';

export const LOG_PREFIX = '[unionmount] ';

/**
 * Dependency Injection Service for the unionmount CLI
 *
 * Creates the filesystem-backed lister, watcher and logger the commands
 * mount with.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private fileLister: FileLister | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Reset the singleton (for testing)
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }

  getFileLister(): FileLister {
    if (!this.fileLister) {
      this.fileLister = new FsFileLister();
    }
    return this.fileLister;
  }

  /** A new watcher per mount, since watch options come from the config. */
  getFileWatcher(options: ChokidarFileWatcherOptions = {}): FileWatcher {
    return new ChokidarFileWatcher(options);
  }

  getLogger(level: LogLevel = 'info'): Logger {
    return createLogger(LOG_PREFIX, level);
  }

  createUnionMount(config: MountConfig): UnionMountModule<string, string> {
    return new UnionMountModule<string, string>({
      fileLister: this.getFileLister(),
      fileWatcher: this.getFileWatcher(config.watch),
      logger: this.getLogger(config.logLevel),
      options: {
        sources: config.sources,
        patterns: config.patterns,
        ignore: config.ignore,
      },
    });
  }
}
