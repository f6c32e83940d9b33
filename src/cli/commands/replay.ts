/**
 * `rte replay <trace-file>` — rebuild the reconstruction document from a
 * recorded list of stop events.
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { getLogger } from '../../core/logger.js';
import { parseTraceScript, scriptEvents } from '../../debugger/script.js';
import { ScriptedDebugger } from '../../debugger/scripted.js';
import { TraceSession } from '../../trace/session.js';
import { collect, openProject } from './shared.js';

interface ReplayOptions {
  dir: string;
  source?: string[];
  banner: boolean;
  verbose?: boolean;
}

export function createReplayCommand(): Command {
  const cmd = new Command('replay');

  cmd
    .description('Replay a recorded trace and print the reconstruction')
    .argument('<trace-file>', 'YAML or JSON trace script')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('-s, --source <directory>', 'Source directory (repeatable)', collect)
    .option('--no-banner', 'Omit the banner above the first call')
    .option('-v, --verbose', 'Log to stderr at debug level')
    .action(async (traceFile: string, options: ReplayOptions) => {
      await replay(traceFile, options);
    });

  return cmd;
}

async function replay(traceFile: string, options: ReplayOptions): Promise<void> {
  const { config, catalog } = openProject(options);
  const path = resolve(traceFile);
  if (!existsSync(path)) {
    throw new Error(`Trace file not found: ${path}`);
  }
  const text = readFileSync(path, 'utf-8');

  const script = parseTraceScript(text, path);
  const session = new TraceSession({
    backend: new ScriptedDebugger(scriptEvents(script)),
    catalog,
    render: { ...config.render, banner: config.render.banner && options.banner },
    sink: {
      show(document) {
        process.stdout.write(document);
      },
    },
  });

  const run = await session.run(script.module, script.function, script.args);
  getLogger().debug({ runId: run.runId, nodes: run.tree.size }, 'Replay finished');
}
