/**
 * `rte init` — write a default `.rte.yaml` into the project directory.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { ConfigManager } from '../../core/config.js';

export function createInitCommand(): Command {
  const cmd = new Command('init');

  cmd
    .description('Create a default .rte.yaml project configuration')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .action((options: { dir: string }) => {
      const path = new ConfigManager(resolve(options.dir)).createDefaultConfig();
      console.log(`Configuration at ${path}`);
    });

  return cmd;
}
