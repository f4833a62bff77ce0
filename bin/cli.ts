#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { Readable, Transform, Writable } from 'stream';
import { pipeline } from 'stream/promises';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import boxen from 'boxen';
import gradient from 'gradient-string';
import {
  BundleError,
  CountLimitError,
  FileSource,
  RecursionLimitError,
  UnexpectedEndError,
  UnknownMagicError,
  createScrambleStream,
  createUnscrambleStream,
  decodeBundle,
  extractPayload,
  loadConfig,
} from '../src/index';
import { EreaderFwConfig, OutputFormat, isOutputFormat } from '../src/config';
import * as textReporter from '../src/reporters/text';
import * as jsonReporter from '../src/reporters/json';

import pkg from '../package.json';

const version = pkg.version;

type GlobalOptions = {
  debug?: boolean;
  maxDepth?: number;
  maxCount?: number;
};

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError('Expected "text" or "json".');
  }
  return value;
}

// Progress and diagnostics go to stderr: stdout may be carrying payload bytes.
function makeDebug(enabled: boolean | undefined) {
  return (msg: string) => {
    if (enabled) console.error(chalk.dim(`[DEBUG] ${msg}`));
  };
}

function resolveSettings(options: GlobalOptions): EreaderFwConfig & { debug: (msg: string) => void } {
  const config = loadConfig();
  return {
    ...config,
    maxDepth: options.maxDepth ?? config.maxDepth,
    maxCount: options.maxCount ?? config.maxCount,
    debug: makeDebug(options.debug),
  };
}

function openInput(file?: string): Readable {
  return file ? fs.createReadStream(file) : process.stdin;
}

function openOutput(file?: string): Writable {
  return file ? fs.createWriteStream(file) : process.stdout;
}

function fail(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`Error: ${message}`));

  // Actionable advice
  if (error instanceof UnknownMagicError) {
    console.error(chalk.dim('Hint: The file does not start with a known bundle magic (SP01, FC02, FD03, FC04, FD04, FL01, FB01, FB02, FB03).'));
  } else if (error instanceof UnexpectedEndError) {
    console.error(chalk.dim('Hint: The file looks truncated; check that the download completed.'));
  } else if (error instanceof RecursionLimitError) {
    console.error(chalk.dim('Hint: Raise --max-depth if the bundle legitimately nests this many signature envelopes.'));
  } else if (error instanceof CountLimitError) {
    console.error(chalk.dim('Hint: Raise --max-count if the header legitimately lists this many entries.'));
  } else if (error instanceof BundleError) {
    console.error(chalk.dim(`Hint: Decoding failed with ${error.kind}.`));
  }

  process.exit(1);
}

function openSource(file: string): FileSource {
  try {
    return FileSource.open(file);
  } catch (error) {
    fail(error);
  }
}

async function transformStream(make: () => Transform, input: string | undefined, output: string | undefined, label: string) {
  console.error(chalk.blue(`${label} ${input ?? 'stdin'} to ${output ?? 'stdout'}...`));
  try {
    await pipeline(openInput(input), make(), openOutput(output));
  } catch (error) {
    fail(error);
  }
}

const program = new Command();

program
  .name('ereader-fw')
  .description('Inspect e-reader firmware update bundles and extract their payloads.')
  .version(version)
  .option('--debug', 'Enable debug logging')
  .option('--max-depth <n>', 'Maximum number of nested signature envelopes', parsePositiveInt)
  .option('--max-count <n>', 'Maximum device or metadata count accepted in a header', parsePositiveInt);

program
  .command('inspect')
  .alias('info')
  .description('Display the metadata of a firmware file')
  .argument('<file>', 'firmware (.bin) file to inspect')
  .option('--format <format>', 'Output format (text, json)', parseFormat)
  .action((file: string, options: { format?: OutputFormat }, command: Command) => {
    const settings = resolveSettings(command.optsWithGlobals<GlobalOptions>());
    const format = options.format ?? settings.format;

    const source = openSource(file);
    try {
      const bundle = decodeBundle(source, {
        limits: { maxDepth: settings.maxDepth, maxCount: settings.maxCount },
        debug: settings.debug,
      });

      if (format === 'json') {
        console.log(jsonReporter.report(bundle, file));
        return;
      }

      const brand = gradient(['#7FDBFF', '#0074D9', '#001F3F']);
      console.log(
        boxen(brand(`E-READER FIRMWARE\n${path.basename(file)}`), {
          padding: 1,
          borderStyle: 'round',
          borderColor: 'cyan',
          title: 'v' + version,
          titleAlignment: 'right',
        }),
      );
      console.log(textReporter.report(bundle, { chalk }));
    } catch (error) {
      fail(error);
    } finally {
      source.close();
    }
  });

program
  .command('dump')
  .alias('convert')
  .description('Extract the unscrambled payload (usually a .tar.gz) from a firmware file')
  .argument('<file>', 'firmware (.bin) file to process')
  .argument('[output]', 'file to write the payload to (default: stdout)')
  .option('--chunk-size <bytes>', 'Bytes read and written per step', parsePositiveInt)
  .action(async (file: string, output: string | undefined, options: { chunkSize?: number }, command: Command) => {
    const settings = resolveSettings(command.optsWithGlobals<GlobalOptions>());
    const spinner = ora({ text: `Extracting payload from ${file} to ${output ?? 'stdout'}...`, stream: process.stderr }).start();

    const source = openSource(file);
    try {
      const summary = await extractPayload(source, () => openOutput(output), {
        limits: { maxDepth: settings.maxDepth, maxCount: settings.maxCount },
        chunkSize: options.chunkSize ?? settings.chunkSize,
        debug: settings.debug,
      });
      spinner.succeed(
        chalk.green(
          `Wrote ${summary.bytesWritten} payload bytes (${summary.bundle.magic} header of ${summary.headerLength} bytes).`,
        ),
      );
    } catch (error) {
      spinner.fail(chalk.red('Extraction failed.'));
      fail(error);
    } finally {
      source.close();
    }
  });

program
  .command('dm')
  .description('Unscramble a raw data stream')
  .argument('[input]', 'file to unscramble (default: stdin)')
  .argument('[output]', 'file to write to (default: stdout)')
  .action(async (input: string | undefined, output: string | undefined) => {
    await transformStream(createUnscrambleStream, input, output, 'Unscrambling');
  });

program
  .command('md')
  .description('Scramble a raw data stream (inverse of dm)')
  .argument('[input]', 'file to scramble (default: stdin)')
  .argument('[output]', 'file to write to (default: stdout)')
  .action(async (input: string | undefined, output: string | undefined) => {
    await transformStream(createScrambleStream, input, output, 'Scrambling');
  });

program.parseAsync().catch(fail);
