import { resolve } from 'node:path';
import { createNodeIO, type ExtraVarsEvent, type IO, processExtraVars } from '@extravars/core';
import type { CommandModule } from 'yargs';
import { ANSI, useColor } from '../utils';
import { formatFailure } from './shared';

export interface MergeOptions {
  sources: string[];
  yaml?: boolean;
  baseDir?: string;
  verbose?: boolean;
}

export interface MergeCommandDependencies {
  cwd(): string;
  colorEnabled(): boolean;
  io: IO;
  stdout(message: string): void;
  stderr(message: string): void;
}

export function createDefaultMergeCommandDependencies(): MergeCommandDependencies {
  return {
    cwd: () => process.cwd(),
    colorEnabled: () => useColor(process.stderr),
    io: createNodeIO(),
    stdout: (message: string) => console.log(message),
    stderr: (message: string) => console.error(message)
  };
}

export function formatEventLine(event: ExtraVarsEvent, color: boolean): string {
  const header = color ? `${ANSI.dim}[${event.type}]${ANSI.reset}` : `[${event.type}]`;

  switch (event.type) {
    case 'sourceDecoded': {
      const origin = event.path === undefined ? event.kind : `${event.kind} ${event.path}`;
      const keys = event.keys.length > 0 ? event.keys.join(', ') : '(no keys)';
      return `${header} source ${event.index + 1} (${origin}): ${keys}`;
    }
    case 'formatDecided': {
      const format = color ? `${ANSI.bold}${event.format}${ANSI.reset}` : event.format;
      return `${header} ${format}: ${event.message}`;
    }
  }
}

/**
 * Merge the sources and print the result. Nothing is printed when no
 * variables were defined.
 */
export async function runMerge(
  argv: MergeOptions,
  deps: MergeCommandDependencies = createDefaultMergeCommandDependencies()
): Promise<string> {
  const color = deps.colorEnabled();
  const cwd = deps.cwd();

  const output = await processExtraVars(argv.sources, {
    forceJson: !argv.yaml,
    baseDir: argv.baseDir ? resolve(cwd, argv.baseDir) : cwd,
    io: deps.io,
    onEvent: argv.verbose ? (event) => deps.stderr(formatEventLine(event, color)) : undefined
  });

  if (output !== '') {
    deps.stdout(output);
  }
  return output;
}

async function handleMerge(argv: MergeOptions): Promise<void> {
  const deps = createDefaultMergeCommandDependencies();
  try {
    await runMerge(argv, deps);
  } catch (error) {
    deps.stderr(formatFailure(error, deps.colorEnabled()));
    process.exit(1);
  }
}

export const mergeBuilder = {
  sources: {
    type: 'string' as const,
    array: true as const,
    describe: 'Extra vars: key=value words, YAML/JSON text, or @file references',
    demandOption: true as const
  },
  yaml: {
    type: 'boolean' as const,
    describe: 'Prefer consolidated YAML (keeps comments) over JSON when it is safe',
    default: false
  },
  'base-dir': {
    type: 'string' as const,
    alias: 'd',
    describe: 'Directory that relative @file references resolve against (default: cwd)'
  },
  verbose: {
    type: 'boolean' as const,
    describe: 'Report each decoded source and the chosen output format on stderr',
    default: false
  }
};

export const mergeCommand: CommandModule<object, MergeOptions> = {
  command: 'merge <sources..>',
  describe:
    'Merge extra vars from several sources into one JSON or YAML document. Unknown --words are kept as raw params',
  builder: (yargs) =>
    yargs
      .options(mergeBuilder)
      // Raw-param words such as `--check` are sources, not options
      .parserConfiguration({ 'unknown-options-as-args': true }),
  handler: async (argv) => {
    await handleMerge(argv);
  }
};
