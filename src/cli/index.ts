#!/usr/bin/env node

/**
 * agentcore CLI Entry Point
 *
 * Example runner for agents built on the SDK. Built with Commander.js.
 *
 * Commands:
 * - run   - Start the configured agent and run until SIGINT/SIGTERM
 * - info  - Show the configured agent identity and capabilities
 *
 * Global Options:
 * - --config <path>        - Configuration file (.yaml, .yml or .json)
 * - --env-prefix <prefix>  - Environment variable prefix (default AGENTCORE)
 * - --verbose, -v          - Enable debug logging
 * - --no-color             - Disable colored output
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import chalk from 'chalk';
import { DEFAULT_ENV_PREFIX } from '../config/index.js';
import { asPlatformError } from '../errors/index.js';
import { registerRunCommand } from './commands/run.js';
import { registerInfoCommand } from './commands/info.js';

// Get package.json for version info
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// src/cli when run from source, dist/src/cli when built
function readPackageVersion(): string {
  const packageJsonPath = ['../../package.json', '../../../package.json']
    .map((relative) => join(__dirname, relative))
    .find((candidate) => existsSync(candidate));
  if (!packageJsonPath) {
    return '0.0.0';
  }

  const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
    return String(packageJson.version);
  }
  return '0.0.0';
}

/**
 * Create and configure the CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('agentcore')
    .description('Agent lifecycle SDK - example runner')
    .version(readPackageVersion(), '-V, --version', 'Output the current version');

  program
    .option('--config <path>', 'Path to configuration file')
    .option('--env-prefix <prefix>', 'Environment variable prefix', DEFAULT_ENV_PREFIX)
    .option('-v, --verbose', 'Enable verbose output')
    .option('--no-color', 'Disable colored output');

  registerRunCommand(program);
  registerInfoCommand(program);

  return program;
}

/**
 * Main CLI execution
 */
async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    const platformError = asPlatformError(error);
    if (platformError) {
      console.error(chalk.red('Error:'), platformError.toString());
    } else if (error instanceof Error) {
      console.error(chalk.red('Error:'), error.message);
    } else {
      console.error(chalk.red('Unknown error:'), error);
    }
    process.exitCode = 1;
  }
}

await main();
