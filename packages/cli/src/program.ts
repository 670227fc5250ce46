import { Command } from 'commander';
import { CliContext, createContext, GlobalOptions, reportError } from './context.js';
import {
  convertCommand,
  ConvertOptions,
  inspectCommand,
  InspectOptions,
  listCommand,
  scoreCommand,
  ScoreOptions,
  sessionCommand,
  SessionOptions,
  upcomingCommand,
  UpcomingOptions,
  verifyCommand,
} from './commands/index.js';

export interface ProgramIO {
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  /** Receives each command's exit code; defaults to setting process.exitCode. */
  onExit?: (code: number) => void;
}

export function createProgram(io: ProgramIO = {}): Command {
  const program = new Command();
  const stderr = io.stderr ?? ((line: string) => console.error(line));
  const onExit = io.onExit ?? ((code: number) => {
    process.exitCode = code;
  });

  const run = async (body: (ctx: CliContext) => number | Promise<number>): Promise<void> => {
    const globalOpts = program.opts<GlobalOptions>();
    let ctx: CliContext;
    try {
      ctx = createContext(globalOpts, { stdout: io.stdout ?? (line => console.log(line)), stderr });
    } catch (err) {
      onExit(reportError({ debug: globalOpts.debug === true, stderr }, 'Failed to load configuration', err));
      return;
    }
    onExit(await body(ctx));
  };

  program
    .name('dojo')
    .description('Practice game inputs against a reference video and score your timing')
    .version('0.1.0');

  // Global options
  program
    .option('-v, --verbose', 'Enable verbose output for all commands')
    .option('--debug', 'Enable debug output (print stack traces)')
    .option('-c, --config <file>', 'JSON configuration file');

  program
    .command('verify')
    .description('Parse and validate a pattern; exit 0 if valid, 2 if invalid')
    .argument('<pattern>', 'Path to a .json or .pat pattern')
    .action(async (file: string) => run(ctx => verifyCommand(ctx, file)));

  program
    .command('inspect')
    .description('Print the structure of a pattern or recording')
    .argument('<file>', 'Path to the pattern or recording')
    .option('-r, --recording', 'Read the file as a recording')
    .option('--json', 'Print the canonical JSON document')
    .action(async (file: string, options: InspectOptions) => run(ctx => inspectCommand(ctx, file, options)));

  program
    .command('convert')
    .description('Convert a pattern between JSON and text (.pat) formats')
    .argument('<input>', 'Source pattern (or recording with --from-recording)')
    .argument('<output>', 'Destination; the extension picks the format')
    .option('--from-recording', 'Promote a recorded session to a pattern')
    .option('--name <name>', 'Pattern name when promoting a recording')
    .action(async (input: string, output: string, options: ConvertOptions) =>
      run(ctx => convertCommand(ctx, input, output, options))
    );

  program
    .command('list')
    .description('List patterns and recordings in a directory')
    .argument('[dir]', 'Directory to list', '.')
    .action(async (dir: string) => run(ctx => listCommand(ctx, dir)));

  program
    .command('upcoming')
    .description('Show the actions due shortly after a playback position')
    .argument('<pattern>', 'Path to the pattern')
    .option('--at <seconds>', 'Playback position', '0')
    .option('--lookahead <seconds>', 'How far ahead to look', '5')
    .action(async (file: string, options: UpcomingOptions) => run(ctx => upcomingCommand(ctx, file, options)));

  program
    .command('score')
    .description('Score a recorded session against a pattern')
    .argument('<pattern>', 'Path to the pattern')
    .argument('<recording>', 'Path to the recording')
    .option('--json', 'Print the report as JSON')
    .option('--tolerance <ms>', "Override the pattern's default tolerance")
    .option('--penalty <points>', 'Points removed per extra input')
    .action(async (patternFile: string, recordingFile: string, options: ScoreOptions) =>
      run(ctx => scoreCommand(ctx, patternFile, recordingFile, options))
    );

  program
    .command('session')
    .description('Replay a captured clock and input timeline through a training session')
    .argument('<timeline>', 'JSON timeline of clock ticks and inputs')
    .option('-p, --pattern <file>', 'Pattern to score against')
    .option('-o, --out <path>', 'Save the recording to this file or directory')
    .action(async (file: string, options: SessionOptions) => run(ctx => sessionCommand(ctx, file, options)));

  return program;
}
