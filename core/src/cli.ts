#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import fs from 'fs/promises';
import { ProgramReader } from './gcode/ProgramReader';
import { ProgramSummary } from './gcode/types';
import { GCodeGenerator } from './program/GCodeGenerator';
import { randomToolLibrary } from './spec/sample';
import { SHAPE_KINDS } from './spec/validate';
import { ErrorHandler } from './utils/error-handler';
import { formatNumber } from './utils/format';
import { Logger } from './utils/logger';

interface GenerateOptions {
  output?: string;
  precision?: number;
  seed?: number;
  maxInstructions?: number;
  verbose?: boolean;
}

const SHAPE_HELP: Record<(typeof SHAPE_KINDS)[number], string> = {
  line: 'from?, to | length + angle?, subdivisions?',
  rectangle: 'width, height, origin?, cornerRadius?',
  circle: 'radius, center?, startAngle?, sweep?',
  arc: 'radius, sweep, center?, startAngle?',
  polygon: 'vertices, closed?',
  regularPolygon: 'sides, radius, center?, rotation?',
  slot: 'length, width, center?, angle?',
  stack: 'base, layers, layerHeight'
};

const logger = new Logger('cli');

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(err: unknown): void {
  console.error(chalk.red(`Error: ${ErrorHandler.formatError(err)}`));
  process.exitCode = 1;
}

async function loadSpec(path: string, options: GenerateOptions): Promise<Record<string, unknown>> {
  const parsed: unknown = JSON.parse(await fs.readFile(path, 'utf8'));
  if (!isRecord(parsed)) {
    throw new Error(`${path} does not contain a JSON object`);
  }

  const spec: Record<string, unknown> = { ...parsed };
  if (options.precision !== undefined) spec.precision = options.precision;
  if (options.maxInstructions !== undefined) spec.maxInstructions = options.maxInstructions;
  if (options.seed !== undefined) {
    if (isRecord(spec.jitter)) {
      spec.jitter = { ...spec.jitter, seed: options.seed };
    }
    if (isRecord(spec.sample)) {
      spec.sample = { ...spec.sample, seed: options.seed };
    }
    if (!isRecord(spec.jitter) && !isRecord(spec.sample)) {
      logger.warn('--seed ignored: the spec has no jitter or sample');
    }
  }
  return spec;
}

function printSummary(file: string, summary: ProgramSummary): void {
  const n = (value: number) => formatNumber(value, 3);
  const { min, max, size } = summary.boundingBox;
  const motions = Object.entries(summary.motionCounts)
    .map(([opcode, count]) => `${opcode}=${count}`)
    .join(' ');

  console.log(chalk.blue(`Program: ${file}`));
  console.log(`Lines: ${summary.lineCount}  Blocks: ${summary.blockCount}  Comments: ${summary.commentCount}`);
  console.log(`Units: ${summary.units ?? 'unset'}`);
  console.log(`Motions: ${motions}`);
  console.log(`Bounds: X ${n(min.x)}..${n(max.x)}  Y ${n(min.y)}..${n(max.y)}  Z ${n(min.z)}..${n(max.z)}`);
  console.log(`Size: ${n(size.x)} x ${n(size.y)} x ${n(size.z)}`);
  console.log(`Path: feed ${n(summary.pathLength.feed)}, rapid ${n(summary.pathLength.rapid)}`);
  console.log(`Estimated time: ${n(summary.estimatedTime)} s`);

  for (const warning of summary.warnings) {
    console.log(chalk.yellow(`line ${warning.line}: ${warning.message}`));
  }
  for (const error of summary.errors) {
    console.log(chalk.red(`line ${error.line}: ${error.message}`));
  }
}

export function createCli(): Command {
  const program = new Command();

  program
    .name('gcode-synth')
    .description('Generate synthetic G-code programs from a declarative spec')
    .version('0.1.0');

  program
    .command('generate')
    .description('Generate a program from a JSON generation spec')
    .argument('<spec>', 'Path to the spec file (JSON)')
    .option('-o, --output <file>', 'Write the program to a file instead of stdout')
    .option('--precision <digits>', 'Decimal places for coordinates and feeds', parseInteger)
    .option('--seed <seed>', 'Override the jitter and sample seeds', parseInteger)
    .option('--max-instructions <count>', 'Fail when the program would be longer', parseInteger)
    .option('-v, --verbose', 'Log progress per shape and layer')
    .action(async (file: string, options: GenerateOptions) => {
      try {
        const spec = await loadSpec(file, options);
        const generator = new GCodeGenerator();

        if (options.verbose) {
          generator.on('shapeStart', event =>
            logger.info(`Shape ${event.index + 1}: ${event.kind}${event.name ? ` (${event.name})` : ''}`)
          );
          generator.on('layerStart', event => logger.info(`  layer ${event.layer}/${event.layerCount}`));
        }

        const { text, stats } = generator.generate(spec);

        if (options.output) {
          await fs.writeFile(options.output, text, 'utf8');
          logger.success(`Wrote ${stats.instructionCount} instructions to ${options.output}`);
        } else {
          process.stdout.write(text);
        }
      } catch (err) {
        fail(err);
      }
    });

  program
    .command('stats')
    .description('Read a G-code program and print its statistics')
    .argument('<file>', 'Path to the program')
    .option('--rapid-rate <rate>', 'Assumed rapid speed, units per minute', parseInteger)
    .action(async (file: string, options: { rapidRate?: number }) => {
      try {
        const text = await fs.readFile(file, 'utf8');
        const reader = new ProgramReader(options.rapidRate !== undefined ? { rapidRate: options.rapidRate } : {});
        const summary = reader.parse(text);
        printSummary(file, summary);
        if (!summary.success) {
          process.exitCode = 1;
        }
      } catch (err) {
        fail(err);
      }
    });

  program
    .command('shapes')
    .description('List the supported shape kinds and their parameters')
    .action(() => {
      for (const kind of SHAPE_KINDS) {
        console.log(`${chalk.green(kind)}: ${SHAPE_HELP[kind]}`);
      }
    });

  program
    .command('tools')
    .description('Print a random tool library (JSON) to draw sample programs from')
    .option('-n, --count <count>', 'Number of tools', parseInteger, 5)
    .option('--seed <seed>', 'Seed for the library', parseInteger, 1)
    .action((options: { count: number; seed: number }) => {
      if (options.count < 1) {
        fail(new Error('--count must be at least 1'));
        return;
      }
      console.log(JSON.stringify(randomToolLibrary(options.seed, options.count), null, 2));
    });

  return program;
}

if (require.main === module) {
  createCli()
    .parseAsync(process.argv)
    .catch(fail);
}
