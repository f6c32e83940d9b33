/**
 * `rte records <module>` — load and list the record definitions of a module.
 */

import { Command } from 'commander';
import { RecordStore } from '../../records/store.js';
import { printExpr, printRecordDefinition } from '../../syntax/printer.js';
import { collect, openProject } from './shared.js';

interface RecordsOptions {
  dir: string;
  source?: string[];
  definitions?: boolean;
  json?: boolean;
}

export function createRecordsCommand(): Command {
  const cmd = new Command('records');

  cmd
    .description('List the records a module defines, in dependency order')
    .argument('<module>', 'Module name')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('-s, --source <directory>', 'Source directory (repeatable)', collect)
    .option('--definitions', 'Print each definition')
    .option('--json', 'Output as JSON')
    .action(async (module: string, options: RecordsOptions) => {
      await listRecords(module, options);
    });

  return cmd;
}

async function listRecords(module: string, options: RecordsOptions): Promise<void> {
  const { catalog } = openProject(options);
  const store = new RecordStore(catalog);
  const names = await store.load(module);

  if (options.json) {
    const defs = names.map((name) => {
      const def = store.require(name);
      return {
        ...def,
        fields: def.fields.map((field) => ({ name: field.name, default: field.default && printExpr(field.default) })),
      };
    });
    console.log(JSON.stringify(defs, null, 2));
    return;
  }

  if (names.length === 0) {
    console.log(`No records defined in ${module}`);
    return;
  }

  if (options.definitions) {
    const forms = await catalog.getRecordDefinitions(module);
    for (const name of names) {
      const form = forms.find((f) => f.name === name);
      if (form) console.log(printRecordDefinition(form));
    }
    return;
  }

  for (const name of names) {
    const def = store.require(name);
    console.log(`${name}  (${def.fields.length} fields, line ${def.line})`);
  }
}
