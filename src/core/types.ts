import { z } from 'zod';

// ===== Configuration =====

export const RteConfigSchema = z.object({
  sourceDirs: z.array(z.string()).default(['src']),
  render: z.object({
    indentUnit: z.string().min(1).default(' '),
    indentWidth: z.number().int().min(0).max(16).default(4),
    banner: z.boolean().default(true),
  }).default({}),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    verbose: z.boolean().default(false),
  }).default({}),
});

export type RteConfig = z.infer<typeof RteConfigSchema>;

export type RenderOptions = RteConfig['render'];

// ===== Events =====

export interface RteEvents {
  'run:started': { runId: string; module: string; function: string; arity: number };
  'run:stop': { runId: string; module: string; function: string; line: number; depth: number };
  'run:exited': { runId: string; nodes: number; reason: string };
  'run:failed': { runId: string; code: string; message: string };
  'records:loaded': { module: string; names: string[] };
  'records:forgotten': { names: string[] };
}
