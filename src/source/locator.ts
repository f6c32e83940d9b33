import { readFile } from 'fs/promises';
import { glob } from 'glob';
import { join } from 'path';
import { SourceNotFoundError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';

/**
 * Finds the source text of a module. Implementations throw
 * `SourceNotFoundError` when the module cannot be located.
 */
export interface SourceLocator {
  locate(module: string): Promise<string>;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'EISDIR');
}

/** File text, or null when there is no file at `path`. */
async function readSource(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }
}

/**
 * Looks for `<module>.erl` in each configured directory, then anywhere
 * below it. Directories are tried in order; first match wins.
 */
export class FileSourceLocator implements SourceLocator {
  constructor(private readonly sourceDirs: string[]) {}

  async locate(module: string): Promise<string> {
    const searched: string[] = [];
    for (const dir of this.sourceDirs) {
      const direct = join(dir, `${module}.erl`);
      searched.push(direct);
      const candidates = [
        direct,
        ...(await glob(`**/${module}.erl`, {
          cwd: dir,
          absolute: true,
          ignore: ['node_modules/**', '.git/**', '_build/**/rebar3_*/**'],
          maxDepth: 8,
        })).sort(),
      ];
      for (const path of candidates) {
        const text = await readSource(path);
        if (text !== null) {
          getLogger().debug({ module, path }, 'Located module source');
          return text;
        }
      }
    }
    throw new SourceNotFoundError(module, searched);
  }
}

export class InMemorySourceLocator implements SourceLocator {
  private sources = new Map<string, string>();

  constructor(sources: Record<string, string> = {}) {
    for (const [module, text] of Object.entries(sources)) {
      this.sources.set(module, text);
    }
  }

  set(module: string, text: string): void {
    this.sources.set(module, text);
  }

  async locate(module: string): Promise<string> {
    const text = this.sources.get(module);
    if (text === undefined) throw new SourceNotFoundError(module);
    return text;
  }
}
