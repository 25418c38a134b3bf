#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { loadConfig, validateConfig } from '../config';
import { createValidator } from '../core';
import { ConfigError, DiscoveryError } from '../core/errors';
import { describeRules, unknownRuleIds } from '../core/evaluator';
import { exitCode, format } from '../core/report';
import { ConsoleLogger, Logger } from '../core/logger';
import { FetchFn, ValidatorConfig } from '../types';

/**
 * Exit status when the run could not start (bad configuration or an
 * unreachable registry listing)
 */
export const EXIT_ABORTED = 2;

export interface CliIO {
  stdout: (text: string) => void;
  stderr?: (text: string) => void;
  /** Defaults to a console logger honouring --verbose */
  logger?: Logger;
  fetch?: FetchFn;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

interface CliOptions {
  config?: string;
  strict?: boolean;
  crossCheck?: boolean;
  only?: string[];
  skip?: string[];
  timeout?: number;
  listRules?: boolean;
  verbose?: boolean;
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

function parseTimeout(value: string): number {
  const timeout = parseInt(value, 10);
  if (isNaN(timeout) || timeout < 1) {
    throw new InvalidArgumentError('Must be a positive number of milliseconds.');
  }
  return timeout;
}

function applyFlags(config: ValidatorConfig, options: CliOptions): ValidatorConfig {
  return {
    ...config,
    strict: options.strict ?? config.strict,
    crossCheck: options.crossCheck ?? config.crossCheck,
    timeoutMs: options.timeout ?? config.timeoutMs,
    skipRules: [...config.skipRules, ...(options.skip ?? [])],
  };
}

async function execute(references: string[], options: CliOptions, io: CliIO): Promise<number> {
  const logger = io.logger ?? new ConsoleLogger(options.verbose ?? false);

  if (options.listRules) {
    io.stdout(`${describeRules().join('\n')}\n`);
    return 0;
  }

  let config: ValidatorConfig;
  try {
    config = applyFlags(
      loadConfig({ file: options.config, basePath: io.cwd, env: io.env, logger }),
      options
    );
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      return EXIT_ABORTED;
    }
    throw error;
  }

  const problems = validateConfig(config);
  const unknown = unknownRuleIds([...(options.only ?? []), ...config.skipRules]);
  if (unknown.length > 0) {
    problems.push(`Unknown rule id(s): ${unknown.join(', ')}. Use --list-rules to see them.`);
  }
  if (problems.length > 0) {
    problems.forEach((problem) => logger.error(problem));
    return EXIT_ABORTED;
  }

  const validator = createValidator({ config, only: options.only, fetch: io.fetch, logger });

  let targets: string[];
  try {
    targets = await validator.resolveReferences(references);
  } catch (error) {
    if (error instanceof DiscoveryError) {
      logger.error(`${error.message}. Pass vocabulary URIs explicitly to skip discovery.`);
      return EXIT_ABORTED;
    }
    throw error;
  }

  const report = await validator.run(targets);
  io.stdout(`${format(report, { strict: config.strict })}\n`);
  return exitCode(report, config.strict);
}

/**
 * Parse `argv` (without the node and script entries) and run the validator.
 * Resolves to the process exit status.
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let status = 0;
  const program = new Command();

  program
    .name('vocab-validator')
    .description('Validate IVOA vocabularies against the structural requirements of Vocabularies in the VO')
    .version('1.0.0')
    .argument(
      '[references...]',
      'URIs of the vocabularies (or local RDF files) to validate; leave out to validate all registered vocabularies'
    )
    .option('-c, --config <path>', 'YAML configuration file')
    .option('--strict', 'Fail vocabularies that only have warnings')
    .option('--cross-check', 'Also fetch the Turtle and desise serializations and compare them')
    .option('--only <ids>', 'Comma-separated rule ids to run', parseList)
    .option('--skip <ids>', 'Comma-separated rule ids to skip', parseList)
    .option('--timeout <ms>', 'HTTP timeout in milliseconds', parseTimeout)
    .option('--list-rules', 'Print the rule checklist and exit')
    .option('-v, --verbose', 'Print progress to stderr')
    .exitOverride()
    .configureOutput({
      writeOut: io.stdout,
      writeErr: io.stderr ?? ((text) => process.stderr.write(text)),
    })
    .action(async (references: string[], options: CliOptions) => {
      status = await execute(references, options, io);
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version end with 0; usage errors abort the run
      return error.exitCode === 0 ? 0 : EXIT_ABORTED;
    }
    throw error;
  }

  return status;
}

if (require.main === module) {
  runCli(process.argv.slice(2), { stdout: (text) => process.stdout.write(text) })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = EXIT_ABORTED;
    });
}
