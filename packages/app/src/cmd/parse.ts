import { type ExtraVars, stringToDict } from '@extravars/core';
import type { CommandModule } from 'yargs';
import { useColor } from '../utils';
import { formatFailure } from './shared';

export interface ParseOptions {
  text: string;
  strict?: boolean;
}

export interface ParseCommandDependencies {
  colorEnabled(): boolean;
  stdout(message: string): void;
  stderr(message: string): void;
}

export function createDefaultParseCommandDependencies(): ParseCommandDependencies {
  return {
    colorEnabled: () => useColor(process.stderr),
    stdout: (message: string) => console.log(message),
    stderr: (message: string) => console.error(message)
  };
}

export function runParse(
  argv: ParseOptions,
  deps: ParseCommandDependencies = createDefaultParseCommandDependencies()
): ExtraVars {
  const vars = stringToDict(argv.text, !argv.strict);
  deps.stdout(JSON.stringify(vars, null, 2));
  return vars;
}

function handleParse(argv: ParseOptions): void {
  const deps = createDefaultParseCommandDependencies();
  try {
    runParse(argv, deps);
  } catch (error) {
    deps.stderr(formatFailure(error, deps.colorEnabled()));
    process.exit(1);
  }
}

export const parseBuilder = {
  text: {
    type: 'string' as const,
    describe: 'YAML/JSON text or key=value words',
    demandOption: true
  },
  strict: {
    type: 'boolean' as const,
    describe: 'Only accept YAML/JSON (no key=value fallback)',
    default: false
  }
};

export const parseCommand: CommandModule<object, ParseOptions> = {
  command: 'parse <text>',
  describe: 'Show how a single extra-vars string is decoded',
  builder: parseBuilder,
  handler: (argv) => {
    handleParse(argv);
  }
};
