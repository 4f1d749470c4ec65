import { z } from 'zod';
import { ExtraVarsError } from './errors';
import { createNodeIO, type IO } from './runtime';
import type { ExtraVarsEventSink } from './types';

export interface ProcessExtraVarsOptions {
  /** Always return JSON. When false, the consolidated YAML is returned if it is safe to. @default true */
  forceJson?: boolean;
  /** Directory relative `@file` references resolve against. @default io.cwd() */
  baseDir?: string;
  /** IO adapter used to read `@file` references. @default createNodeIO() */
  io?: IO;
  onEvent?: ExtraVarsEventSink;
}

export interface ResolvedProcessOptions {
  forceJson: boolean;
  baseDir: string;
  io: IO;
  onEvent?: ExtraVarsEventSink;
}

export const ProcessExtraVarsOptionsSchema = z.object({
  forceJson: z.boolean().optional(),
  baseDir: z.string().trim().min(1).optional()
});

/**
 * Validate options and fill in defaults.
 *
 * @throws {ExtraVarsError} with code `INVALID_OPTIONS`
 */
export function resolveProcessOptions(
  options: ProcessExtraVarsOptions | undefined
): ResolvedProcessOptions {
  const parsed = ProcessExtraVarsOptionsSchema.safeParse({
    forceJson: options?.forceJson,
    baseDir: options?.baseDir
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ExtraVarsError(
      'INVALID_OPTIONS',
      issue ? `${issue.path.join('.') || 'options'}: ${issue.message}` : 'Invalid options.'
    );
  }

  const io = options?.io ?? createNodeIO();
  const resolved: ResolvedProcessOptions = {
    forceJson: parsed.data.forceJson ?? true,
    baseDir: parsed.data.baseDir ?? io.cwd(),
    io
  };
  if (options?.onEvent) {
    resolved.onEvent = options.onEvent;
  }
  return resolved;
}
