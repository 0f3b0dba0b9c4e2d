#!/usr/bin/env node
/**
 * Describe CLI - write descriptions (e.g. alt text) into photo metadata
 *
 * Usage:
 *   npm run describe -- descriptions.tsv --search-dir ~/Pictures/Session
 *   npm run describe:dry-run -- descriptions.tsv
 *   cat descriptions.tsv | npm run describe -- -
 */

import { config as loadDotenv } from 'dotenv';
import { readFile } from 'fs/promises';
import { realpathSync } from 'fs';
import { resolve } from 'path';
import { createInterface } from 'readline';
import { pathToFileURL } from 'url';
import {
  ConfigManager,
  configFromEnv,
  findDefaultConfigFile,
  type DescribeConfig,
} from './config.js';
import { createExifToolWriterFactory, type DescriptionWriterFactory } from './description-writer.js';
import { runDescribe, type DescribeRunReport } from './describe-pipeline.js';
import { describeError } from './errors.js';
import { AppError, handleError, LOG_LEVELS, logger, type LogLevel } from './logger.js';
import { formatPlanReport, toPlanJson } from './plan-builder.js';
import { formatExecutionReport } from './plan-executor.js';

// ============================================================================
// CLI Argument Parsing
// ============================================================================

export interface CliArgs {
  command: 'run' | 'help' | 'print-config';
  /** Input file, or `-` for stdin */
  input?: string;
  configPath?: string;
  json: boolean;
  yes: boolean;
  overrides: Partial<DescribeConfig>;
}

export class UsageError extends AppError {
  constructor(message: string) {
    super(message, 'USAGE', 2);
    this.name = 'UsageError';
  }
}

function takeValue(args: string[], flag: string): string {
  const value = args.shift();
  if (value === undefined || (value.startsWith('-') && value !== '-')) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

export function parseArgs(argv: string[]): CliArgs {
  const args = [...argv];
  const result: CliArgs = {
    command: 'run',
    json: false,
    yes: false,
    overrides: {},
  };

  while (args.length > 0) {
    const arg = args.shift();
    switch (arg) {
      case '-h':
      case '--help':
        result.command = 'help';
        break;
      case '--print-config':
        result.command = 'print-config';
        break;
      case '--search-dir':
        result.overrides.rootDir = takeValue(args, arg);
        break;
      case '-n':
      case '--dry-run':
        result.overrides.dryRun = true;
        break;
      case '--ignore-jpg':
        result.overrides.ignoreWritableImages = true;
        break;
      case '--max-scan-items': {
        const raw = takeValue(args, arg);
        const value = Number(raw);
        if (!Number.isInteger(value) || value < 1) {
          throw new UsageError(`--max-scan-items must be a whole number of at least 1, got "${raw}"`);
        }
        result.overrides.scanLimit = value;
        break;
      }
      case '--overwrite-descriptions':
        result.overrides.overwriteDescriptions = true;
        break;
      case '--overwrite-originals':
        result.overrides.overwriteOriginals = true;
        break;
      case '--continue-on-error':
        result.overrides.continueOnError = true;
        break;
      case '--config':
        result.configPath = takeValue(args, arg);
        break;
      case '--json':
        result.json = true;
        break;
      case '-y':
      case '--yes':
        result.yes = true;
        break;
      default:
        if (arg === undefined) break;
        if (arg.startsWith('-') && arg !== '-') {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        if (result.input !== undefined) {
          throw new UsageError(`Unexpected argument: ${arg}`);
        }
        result.input = arg;
    }
  }

  if (result.command === 'run' && result.input === undefined) {
    throw new UsageError('Missing input file (use - to read from stdin)');
  }

  return result;
}

export const USAGE = `
Describe CLI - write descriptions to the XMP Description metadata field

USAGE:
  describe-media <input.tsv | -> [options]

The input is tab-separated: <filename><TAB><description>, one per line.
Files are matched on filename stem only; directories and extensions are
ignored. Descriptions for raw files go to XMP sidecars, created as needed.

OPTIONS:
  --search-dir <dir>          Directory to search (default: current directory)
  -n, --dry-run               Find matching files and print the plan; write nothing
  --ignore-jpg                Ignore jpg/heic files when searching
  --max-scan-items <n>        Abort the search after visiting n files (default: 30000)
  --overwrite-descriptions    Replace existing, different descriptions
  --overwrite-originals       Do not keep exiftool "_original" backup copies
  --continue-on-error         Keep writing after a file fails
  --config <file>             YAML or JSON config file (default: ./describe-media.yaml if present)
  --json                      Print the plan and results as JSON
  -y, --yes                   Do not ask for confirmation
  --print-config              Print the effective configuration and exit
  -h, --help                  Show this help message

EXAMPLES:
  # Preview which files would be updated
  npm run describe:dry-run -- alt-text.tsv --search-dir ./Session/Selects

  # Write, skipping rendered jpgs in a Capture One session
  npm run describe -- alt-text.tsv --search-dir ./Session --ignore-jpg
`;

// ============================================================================
// Runtime
// ============================================================================

export interface CliContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readInput: (source: string) => Promise<string>;
  confirm: (message: string) => Promise<boolean>;
  openWriter?: DescriptionWriterFactory;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/**
 * Ask on stderr so stdout stays a clean report. Reads stdin, so it must not
 * be used when stdin carries the input list.
 */
async function confirm(message: string): Promise<boolean> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stderr,
  });

  return new Promise((resolve) => {
    rl.question(`${message} (y/N) `, (answer) => {
      rl.close();
      resolve(answer.trim().toLowerCase() === 'y');
    });
  });
}

export function defaultCliContext(): CliContext {
  return {
    cwd: process.cwd(),
    env: process.env,
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
    readInput: (source) => (source === '-' ? readStdin() : readFile(source, 'utf-8')),
    confirm,
  };
}

function stricterLevel(left: LogLevel, right: LogLevel): LogLevel {
  return LOG_LEVELS.indexOf(left) >= LOG_LEVELS.indexOf(right) ? left : right;
}

export function loadCliConfig(args: CliArgs, context: CliContext): DescribeConfig {
  const configPath = args.configPath
    ? resolve(context.cwd, args.configPath)
    : findDefaultConfigFile(context.cwd);
  const config = new ConfigManager(configPath)
    .apply(configFromEnv(context.env))
    .apply(args.overrides)
    .resolve();
  return { ...config, rootDir: resolve(context.cwd, config.rootDir) };
}

function hasUnresolvedRecords(report: DescribeRunReport): boolean {
  const { summary } = report.plan;
  const { counts } = report.execution;
  return summary.ambiguous > 0 || summary.notFound > 0 || counts.failed > 0 || counts['not-attempted'] > 0;
}

function renderJson(report: DescribeRunReport): string {
  return JSON.stringify(
    {
      dryRun: report.execution.dryRun,
      catalog: report.catalog,
      plan: toPlanJson(report.plan),
      results: report.execution.results.map((result) => ({
        line: result.entry.record.lineNo,
        stem: result.entry.record.stem,
        status: result.status,
        ...(result.error ? { error: result.error, errorCode: result.errorCode } : {}),
      })),
      counts: report.execution.counts,
      aborted: report.execution.aborted,
      emptyDescriptions: report.emptyDescriptionStems,
    },
    null,
    2
  );
}

/**
 * Run the CLI and return its exit code: 0 when every record was handled,
 * 1 on fatal errors or unresolved records, 2 on usage errors.
 */
export async function runCli(argv: string[], context: CliContext = defaultCliContext()): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    context.stderr(`❌ ${describeError(error)}`);
    context.stderr(USAGE);
    return 2;
  }

  if (args.command === 'help') {
    context.stdout(USAGE);
    return 0;
  }

  try {
    const config = loadCliConfig(args, context);
    logger.setMinLevel(args.json ? stricterLevel(config.logLevel, 'warn') : config.logLevel);

    if (args.command === 'print-config') {
      const manager = new ConfigManager(null).apply(config);
      context.stdout(manager.toYAML());
      return 0;
    }

    const inputSource = args.input === undefined || args.input === '-' ? '-' : resolve(context.cwd, args.input);
    const readsStdin = inputSource === '-';
    let { overwriteOriginals } = config;
    if (overwriteOriginals && !config.dryRun && !args.yes) {
      if (readsStdin) {
        throw new UsageError(
          '--overwrite-originals cannot be confirmed while the input is read from stdin; add --yes'
        );
      }
      overwriteOriginals = await context.confirm(
        'Warning: You\'ve chosen to overwrite original files without creating backup copies. Are you sure?'
      );
      if (!overwriteOriginals) {
        logger.warn('overwriteOriginals turned off', undefined, 'DescribeCli');
      }
    }

    if (config.dryRun) {
      logger.warn('DRY RUN -- Nothing will be written', undefined, 'DescribeCli');
    }

    const input = await context.readInput(inputSource);

    const report = await runDescribe(
      {
        input,
        rootDir: config.rootDir,
        scanLimit: config.scanLimit,
        dryRun: config.dryRun,
        ignoreDirs: config.ignoreDirs,
        ignoreWritableImages: config.ignoreWritableImages,
        continueOnError: config.continueOnError,
      },
      {
        openWriter:
          context.openWriter ??
          createExifToolWriterFactory({
            overwriteDescriptions: config.overwriteDescriptions,
            overwriteOriginals,
          }),
      }
    );

    if (args.json) {
      context.stdout(renderJson(report));
    } else {
      context.stdout(formatPlanReport(report.plan, { rootDir: config.rootDir, dryRun: config.dryRun }));
      context.stdout(formatExecutionReport(report.execution));
    }

    return hasUnresolvedRecords(report) ? 1 : 0;
  } catch (error) {
    context.stderr(`❌ ${describeError(error)}`);
    return error instanceof UsageError ? 2 : 1;
  }
}

// ============================================================================
// Main Entry Point
// ============================================================================

function isDirectRun(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isDirectRun()) {
  loadDotenv({ override: false });
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      handleError(error, 'DescribeCli');
      process.exitCode = 1;
    });
}
