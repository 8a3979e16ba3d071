import { Command, InvalidArgumentError } from 'commander';
import { basename } from 'path';
import { MixWorkflowService } from '../services/MixWorkflowService.js';
import { printConfigSummary } from '../config/index.js';
import { ErrorHandler } from '../utils/errorHandler.js';
import { Logger } from '../utils/logger.js';
import type { CLIOptions } from '../types/index.js';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!/^-?\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Must be an integer.');
  }
  return parsed;
}

export function parseSlice(value: string): string {
  if (!/^[TtBb]\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Must look like T500 (first 500) or B500 (last 500).');
  }
  return value.trim().toUpperCase();
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createCLI(workflow = new MixWorkflowService()): Command {
  const program = new Command();

  program
    .name('playlist-mixer')
    .description('Mix several playlists into one, weighted per playlist')
    .version('1.0.0');

  program
    .command('mix')
    .description('Mix playlists into a new playlist export')
    .argument('[files...]', 'playlist files (defaults to every .txt in the input folder)')
    .option('-i, --input <dir>', 'folder holding the source playlists')
    .option('-o, --output <dir>', 'folder receiving the mixed playlist')
    .option('-w, --weight <playlist=weight>', 'mixing weight of a playlist, repeatable', collect, [])
    .option('-a, --max-per-artist <n>', 'maximum tracks per artist', parsePositiveInt)
    .option('--allow-duplicates', 'keep the same song when it appears more than once')
    .option('--exclude-shared', 'drop songs that appear in more than one playlist')
    .option('-r, --randomize', 'pick tracks randomly within each playlist')
    .option('-s, --seed <n>', 'seed for reproducible randomized mixes', parseInteger)
    .option('-n, --max-length <n>', 'maximum number of tracks in the mix', parsePositiveInt)
    .option('--slice <T500|B500>', 'only use the first (T) or last (B) n tracks of each playlist', parseSlice)
    .option('--max-tracks <n>', 'only use the first n tracks of each playlist', parsePositiveInt)
    .option('--name <base>', 'base name of the output files')
    .option('--timestamp', 'append the date and time to the output file names')
    .option('-d, --dry-run', 'mix without writing any file')
    .option('-v, --verbose', 'enable debug logging')
    .action(
      ErrorHandler.handleAsync(async (files: string[], options: CLIOptions) => {
        if (options.verbose) {
          Logger.setLevel('debug');
          printConfigSummary();
        }

        const summary = await workflow.run(files, options);
        console.log(`\n✓ Done – ${summary.result.tracks.length} tracks (${summary.result.status}).`);
        if (summary.files) {
          console.log(`   ${summary.files.csv}`);
          console.log(`   ${summary.files.text}`);
          console.log(`   ${summary.files.apple}`);
        }
      })
    );

  program
    .command('list')
    .description('List the playlists available in the input folder')
    .option('-i, --input <dir>', 'folder holding the source playlists')
    .action(
      ErrorHandler.handleAsync(async (options: Pick<CLIOptions, 'input'>) => {
        const files = await workflow.listPlaylists(options.input);
        if (files.length === 0) {
          console.log('No .txt playlists found.');
          return;
        }

        console.log('Available playlists:');
        files.forEach((file, index) => {
          console.log(`${String(index + 1).padStart(2)}. ${basename(file)}`);
        });
      })
    );

  return program;
}
