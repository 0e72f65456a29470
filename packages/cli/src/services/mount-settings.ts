import { promises as fs } from 'fs';
import * as path from 'path';
import { DEFAULT_CONFIG_FILE, loadMountConfig } from '@unionmount/core';
import type { LogLevel, MountConfig, MountSource, TagPattern } from '@unionmount/core';
import type { MountCommandOptions } from '../interfaces/command';

/** Used when neither flags nor the config file name a pattern. */
export const DEFAULT_PATTERN: TagPattern<string> = { tag: 'file', pattern: '**/*' };

export class MountSettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MountSettingsError';
    Object.setPrototypeOf(this, MountSettingsError.prototype);
  }
}

/** Commander reducer for repeatable options. */
export function collectValues(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Splits `key=value` at the first `=`. Both halves must be non-empty.
 */
export function parseAssignment(raw: string, flag: string): [string, string] {
  const index = raw.indexOf('=');
  if (index <= 0 || index === raw.length - 1) {
    throw new MountSettingsError(`Invalid ${flag} '${raw}': expected <name>=<value>`);
  }
  return [raw.slice(0, index), raw.slice(index + 1)];
}

export function parseSources(values: readonly string[], cwd: string): MountSource<string>[] {
  const seen = new Set<string>();
  return values.map((raw) => {
    const [source, dir] = parseAssignment(raw, '--source');
    if (seen.has(source)) {
      throw new MountSettingsError(`Duplicate source name '${source}'`);
    }
    seen.add(source);
    return { source, root: path.resolve(cwd, dir) };
  });
}

export function parsePatterns(values: readonly string[]): TagPattern<string>[] {
  return values.map((raw) => {
    const [tag, pattern] = parseAssignment(raw, '--pattern');
    return { tag, pattern };
  });
}

async function findDefaultConfig(cwd: string): Promise<string | undefined> {
  const candidate = path.join(cwd, DEFAULT_CONFIG_FILE);
  try {
    await fs.access(candidate);
    return candidate;
  } catch {
    return undefined;
  }
}

function resolveLogLevel(options: MountCommandOptions, configured: LogLevel | undefined): LogLevel {
  if (options.verbose) return 'debug';
  if (options.quiet || options.json) return 'error';
  return configured ?? 'info';
}

/**
 * Merges the config file (explicit, or `unionmount.yaml` in `cwd`) with the
 * command line. `--source` and `--pattern` replace the file's lists;
 * `--ignore` adds to them.
 */
export async function resolveMountSettings(options: MountCommandOptions, cwd: string): Promise<MountConfig> {
  const configPath = options.config ? path.resolve(cwd, options.config) : await findDefaultConfig(cwd);
  const base: MountConfig = configPath
    ? await loadMountConfig(configPath)
    : { sources: [], patterns: [], ignore: [], watch: {} };

  const sources = options.source?.length ? parseSources(options.source, cwd) : base.sources;
  if (sources.length === 0) {
    throw new MountSettingsError('No sources given: pass --source <name=dir> or a config file');
  }
  const patterns = options.pattern?.length ? parsePatterns(options.pattern) : base.patterns;

  return {
    sources,
    patterns: patterns.length > 0 ? patterns : [DEFAULT_PATTERN],
    ignore: [...base.ignore, ...(options.ignore ?? [])],
    logLevel: resolveLogLevel(options, base.logLevel),
    watch: base.watch,
  };
}
