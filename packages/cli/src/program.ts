/**
 * tracegraph command line
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import { consoleIO, runInspect, runList, runReplay, type CommandIO } from './commands.js';
import { VERBOSITY_LEVELS, type Verbosity } from './render.js';

export const CLI_VERSION = '0.1.0';

/**
 * Build the program. Each action stores its result in `process.exitCode`
 * unless `onExit` is given.
 */
export function createProgram(
  io: CommandIO = consoleIO,
  onExit: (code: number) => void = code => {
    process.exitCode = code;
  }
): Command {
  const program = new Command();

  program
    .name('tracegraph')
    .description('Inspect and replay recorded agent traces')
    .version(CLI_VERSION)
    .configureOutput({
      writeOut: text => io.stdout(text.trimEnd()),
      writeErr: text => io.stderr(text.trimEnd()),
    });

  // ===========================================================================
  // inspect
  // ===========================================================================

  program
    .command('inspect <trace-file>')
    .description('Print a summary and tree for a trace JSON file')
    .addOption(
      new Option('--verbosity <level>', 'Tree detail').choices(VERBOSITY_LEVELS).default('standard')
    )
    .option('--json', 'Emit a machine-readable summary instead of text')
    .option('--output <path>', 'Write the --json summary to a file')
    .action(
      async (
        file: string,
        options: { verbosity: Verbosity; json?: boolean; output?: string }
      ) => {
        onExit(
          await runInspect(
            file,
            { ...options, color: chalk.level > 0 },
            io
          )
        );
      }
    );

  // ===========================================================================
  // list
  // ===========================================================================

  program
    .command('list <directory>')
    .description('List the traces stored in a directory')
    .action(async (directory: string) => {
      onExit(await runList(directory, io));
    });

  // ===========================================================================
  // replay
  // ===========================================================================

  program
    .command('replay <trace-file>')
    .description('Replay node start and end events in time order')
    .option('-s, --speed <multiplier>', 'Playback speed (0 = no waiting)', parseSpeed, 1)
    .action(async (file: string, options: { speed: number }) => {
      onExit(await runReplay(file, { speed: options.speed }, io));
    });

  return program;
}

function parseSpeed(value: string): number {
  const speed = Number(value);
  if (!Number.isFinite(speed) || speed < 0) {
    throw new InvalidArgumentError('must be a non-negative number');
  }
  return speed;
}
