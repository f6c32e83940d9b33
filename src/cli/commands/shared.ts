import { resolve } from 'path';
import { ConfigManager } from '../../core/config.js';
import { createLogger, setLogger } from '../../core/logger.js';
import type { RteConfig } from '../../core/types.js';
import { ModuleCatalog } from '../../source/catalog.js';
import { FileSourceLocator } from '../../source/locator.js';

export interface ProjectOptions {
  dir: string;
  source?: string[];
  verbose?: boolean;
}

export interface Project {
  config: RteConfig;
  catalog: ModuleCatalog;
}

/** Load config for `options.dir` and install the logger it asks for. */
export function openProject(options: ProjectOptions): Project {
  const configManager = new ConfigManager(resolve(options.dir));
  const config = configManager.load({
    sourceDirs: options.source,
    logging: options.verbose ? { verbose: true, level: 'debug' } : undefined,
  });

  setLogger(createLogger({ level: config.logging.level, verbose: config.logging.verbose }));

  return { config, catalog: new ModuleCatalog(new FileSourceLocator(config.sourceDirs)) };
}

export function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}
