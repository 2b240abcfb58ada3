import {
  BuildVideosCommand,
  BuildVideosHandler,
  type BuildVideosPayload,
  encoderDeadlineSchema,
  type JobReport,
} from '../application/video-build/index.js';
import type { EncoderDeadline, EncoderProcess } from '../domain/video-container/index.js';
import {
  FfmpegTranscodingInvoker,
  FileContainerWriter,
  FileIntermediateCleaner,
  FileSystemInputEnumerator,
  resolveFfmpeg,
} from '../infrastructure/video-build/index.js';
import { type EnvironmentVariables, loadEnvironment } from '../shared/config/env.js';
import { AppError } from '../shared/errors/app-error.js';

export const ExitCode = {
  Success: 0,
  NoInputs: 1,
  Failure: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export const USAGE = `Usage: build-videos <src> <out> [options]

Convert videos to WebM (VP9) and wrap them into .video containers.

Arguments:
  src                      Input file or directory
  out                      Output directory (created if missing)

Options:
  --recursive              Scan the input directory recursively
  --keep-webm              Keep intermediate .webm files
  --force                  Overwrite outputs if they exist
  --keep-going             Continue with the next file when one fails
  --ffmpeg <path>          Path to the ffmpeg binary
  --crf <int>              VP9 quality, lower is better (default 30)
  --deadline <mode>        realtime | good | best (default good)
  --cpu-used <int>         VP9 speed/quality tradeoff (default 4)
  --audio                  Keep audio, encoded as Opus
  --audio-bitrate <int>    Opus bitrate in kbps (default 128)
  -h, --help               Show this message`;

export const LICENSING_NOTE =
  'Note: If you bundle ffmpeg, see THIRD_PARTY.md for licensing requirements.';

export type ParsedCommandLine =
  | { readonly kind: 'help' }
  | { readonly kind: 'build'; readonly payload: BuildVideosPayload; readonly ffmpegPath?: string };

interface EncodingFlags {
  crf?: number;
  deadline?: EncoderDeadline;
  cpuUsed?: number;
  audio: boolean;
  audioBitrateKbps?: number;
  force: boolean;
}

const BOOLEAN_FLAGS = new Set(['--recursive', '--keep-webm', '--force', '--keep-going', '--audio', '--help']);

export function parseCliArguments(argv: readonly string[]): ParsedCommandLine {
  const positionals: string[] = [];
  const encoding: EncodingFlags = { audio: false, force: false };
  let recursive = false;
  let keepIntermediate = false;
  let keepGoing = false;
  let ffmpegPath: string | undefined;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    if (arg === '--') {
      positionals.push(...argv.slice(i + 1));
      break;
    }

    if (arg === '-h') {
      return { kind: 'help' };
    }

    if (!arg.startsWith('-') || arg === '-') {
      positionals.push(arg);
      continue;
    }

    const separator = arg.indexOf('=');
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    let value: string | undefined;

    if (BOOLEAN_FLAGS.has(flag)) {
      if (separator !== -1) {
        throw usageError(`${flag} does not take a value`);
      }
    } else if (separator !== -1) {
      value = arg.slice(separator + 1);
    } else {
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        value = next;
        i += 1;
      }
    }

    switch (flag) {
      case '--help':
        return { kind: 'help' };
      case '--recursive':
        recursive = true;
        break;
      case '--keep-webm':
        keepIntermediate = true;
        break;
      case '--force':
        encoding.force = true;
        break;
      case '--keep-going':
        keepGoing = true;
        break;
      case '--audio':
        encoding.audio = true;
        break;
      case '--ffmpeg':
        ffmpegPath = requireValue(flag, value);
        break;
      case '--crf':
        encoding.crf = parseInteger(flag, value);
        break;
      case '--cpu-used':
        encoding.cpuUsed = parseInteger(flag, value);
        break;
      case '--audio-bitrate':
        encoding.audioBitrateKbps = parseInteger(flag, value);
        break;
      case '--deadline':
        encoding.deadline = parseDeadline(flag, value);
        break;
      default:
        throw usageError(`Unknown argument: ${arg}`);
    }
  }

  if (positionals.length !== 2) {
    throw usageError(
      positionals.length < 2
        ? 'Both <src> and <out> are required'
        : `Unexpected argument: ${positionals[2]}`,
    );
  }

  const [source, outputDir] = positionals;
  return {
    kind: 'build',
    payload: { source, outputDir, recursive, keepIntermediate, keepGoing, encoding },
    ffmpegPath,
  };
}

export interface CliOutput {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface CliDependencies {
  readonly output?: CliOutput;
  readonly env?: EnvironmentVariables;
  /** Where `third_party/ffmpeg` is looked for; VIDEO_TOOL_ROOT overrides it. */
  readonly toolRoot?: string;
  readonly platform?: NodeJS.Platform;
  readonly encoderProcess?: EncoderProcess;
}

const consoleOutput: CliOutput = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

export async function runCli(argv: readonly string[], dependencies: CliDependencies = {}): Promise<ExitCode> {
  const output = dependencies.output ?? consoleOutput;
  const env = dependencies.env ?? process.env;

  try {
    const commandLine = parseCliArguments(argv);
    if (commandLine.kind === 'help') {
      output.stdout(USAGE);
      return ExitCode.Success;
    }

    const environment = loadEnvironment(env);
    const ffmpeg = await resolveFfmpeg({
      explicitPath: commandLine.ffmpegPath ?? environment.FFMPEG_PATH,
      toolRoot: environment.VIDEO_TOOL_ROOT ?? dependencies.toolRoot,
      platform: dependencies.platform,
      env,
    });

    output.stdout(`Using ffmpeg: ${ffmpeg.binary}`);
    if (ffmpeg.libraryDir) {
      output.stdout(`Using ffmpeg libs: ${ffmpeg.libraryDir}`);
    }
    output.stdout(LICENSING_NOTE);

    const handler = new BuildVideosHandler(
      {
        enumerator: new FileSystemInputEnumerator(),
        invoker: new FfmpegTranscodingInvoker({
          ffmpeg,
          process: dependencies.encoderProcess,
          env,
          platform: dependencies.platform,
        }),
        writer: new FileContainerWriter(),
        cleaner: new FileIntermediateCleaner(),
      },
      { onJobFinished: (report) => printReport(output, report) },
    );

    const outcome = await handler.execute(new BuildVideosCommand(commandLine.payload));

    switch (outcome.status) {
      case 'empty':
        output.stdout('No input videos found.');
        return ExitCode.NoInputs;
      case 'failed': {
        const failed = outcome.reports.filter((report) => report.status === 'failed').length;
        output.stderr(`${failed} of ${outcome.reports.length} file(s) failed.`);
        return ExitCode.Failure;
      }
      case 'completed':
        return ExitCode.Success;
    }
  } catch (error) {
    output.stderr(`Error: ${AppError.fromUnknown(error).message}`);
    return ExitCode.Failure;
  }
}

function printReport(output: CliOutput, report: JobReport): void {
  if (report.status === 'built') {
    output.stdout(`Built ${report.finalPath}`);
  } else {
    output.stderr(`Failed ${report.sourcePath}: ${report.error.message}`);
  }
}

function usageError(message: string): AppError {
  return AppError.validation('cli.invalid-arguments', {}, `${message}\n\n${USAGE}`);
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value === '') {
    throw usageError(`${flag} expects a value`);
  }
  return value;
}

function parseInteger(flag: string, value: string | undefined): number {
  const raw = requireValue(flag, value);
  if (!/^-?\d+$/.test(raw)) {
    throw usageError(`${flag} expects an integer, received ${JSON.stringify(raw)}`);
  }
  return Number(raw);
}

function parseDeadline(flag: string, value: string | undefined): EncoderDeadline {
  const parsed = encoderDeadlineSchema.safeParse(requireValue(flag, value));
  if (!parsed.success) {
    throw usageError(`${flag} must be one of ${encoderDeadlineSchema.options.join(', ')}`);
  }
  return parsed.data;
}
