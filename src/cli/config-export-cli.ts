#!/usr/bin/env node

/**
 * Icinga 2 Config Export CLI - export configuration packages from the
 * config management API into one JSON bundle per package
 */

import { Command, CommanderError, OutputConfiguration } from 'commander';
import { CliExportOptions, ExportAdapter } from './adapters/ExportAdapter';
import { normalizeFlagArgs } from './flags';
import { EXIT_CONFIGURATION_ERROR, EXIT_RUNTIME_ERROR, EXIT_SUCCESS } from '../core/errors';
import { DEFAULT_PORT, PASSWORD_ENV_VAR } from '../core/validators/ConfigValidator';
import { createCliLogger, logLevelFor } from '../services/logger';
import { version } from '../../package.json';

/**
 * Build the commander program; run receives the parsed options
 */
export function createProgram(
  run: (options: CliExportOptions) => Promise<void>,
  output?: OutputConfiguration
): Command {
  const program = new Command();

  program
    .name('icinga2-config-export')
    .description(
      `Export Icinga 2 config packages into <package>.json bundles (password from $${PASSWORD_ENV_VAR})`
    )
    .version(version)
    .option('--host <host>', 'API host')
    .option('--port <port>', `API port (default: "${DEFAULT_PORT}")`)
    .option('--ca <file>', 'PEM file with the CA certificate(s) to trust')
    .option('--cn <name>', 'Common name expected in the server certificate')
    .option('--user <name>', 'API user')
    .option('-c, --config <file>', 'YAML file with defaults for the options above')
    .option('-o, --output <dir>', 'Output directory (default: current directory)')
    .option('--skip-internal', 'Skip packages whose name starts with "_"')
    .option('--escape-file-paths', 'Escape file names in request paths')
    .option('--quiet', 'Only log errors')
    .option('--verbose', 'Show detailed information')
    .exitOverride()
    .action(async (options: CliExportOptions) => {
      await run(options);
    });

  if (output) {
    program.configureOutput(output);
  }

  return program;
}

/**
 * Parse argv, run the export and resolve to the process exit code
 */
export async function main(argv: string[]): Promise<number> {
  let exitCode = EXIT_SUCCESS;

  const program = createProgram(async options => {
    const logger = createCliLogger({ level: logLevelFor(options) });
    exitCode = await new ExportAdapter({ logger }).execute(options);
  });

  try {
    await program.parseAsync(normalizeFlagArgs(argv));
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version also end up here
      return error.exitCode === 0 ? EXIT_SUCCESS : EXIT_CONFIGURATION_ERROR;
    }
    throw error;
  }

  return exitCode;
}

if (require.main === module) {
  main(process.argv).then(
    code => {
      process.exitCode = code;
    },
    error => {
      console.error('Fatal error:', error);
      process.exitCode = EXIT_RUNTIME_ERROR;
    }
  );
}
