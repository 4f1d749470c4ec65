import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { mergeCommand } from './cmd/merge';
import { parseCommand } from './cmd/parse';
import { VERSION } from './version';

export async function cli(args: string[]): Promise<void> {
  await yargs(hideBin(['node', 'cli', ...args]))
    .scriptName('extravars')
    .usage('$0 <command> [options]')
    .command(mergeCommand)
    .command(parseCommand)
    .demandCommand(1, 'You need to specify a command')
    .strict()
    .help()
    .version(VERSION)
    .parseAsync();
}
