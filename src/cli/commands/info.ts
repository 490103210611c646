/**
 * Info Command - print the configured agent's info snapshot without starting it
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadServiceConfig } from '../../config/index.js';
import { serializeAgentInfo } from '../../lifecycle/index.js';
import { getLogger } from '../../logging/logger.js';
import { agentBuilderFromConfig } from '../agent-factory.js';
import type { RunOptions } from './run.js';

export interface InfoOptions extends Pick<RunOptions, 'config' | 'envPrefix'> {
  json?: boolean;
}

/**
 * Execute the info command
 */
export function infoCommand(options: InfoOptions): void {
  const config = loadServiceConfig({ file: options.config, envPrefix: options.envPrefix });
  const agent = agentBuilderFromConfig(config.agent, getLogger()).build();
  const info = agent.getInfo();

  if (options.json) {
    console.log(serializeAgentInfo(info, true));
    return;
  }

  console.log(chalk.bold(`${info.name} (${info.id})`));
  console.log(`  Version: ${info.version}`);
  console.log(`  State:   ${info.state}`);
  for (const capability of info.capabilities) {
    console.log(`  - ${capability.name}@${capability.version}`);
  }
}

/**
 * Register the info command with Commander
 */
export function registerInfoCommand(program: Command): void {
  program
    .command('info')
    .description('Show the configured agent identity and capabilities')
    .option('--json', 'Output in JSON format')
    .action((commandOptions: { json?: boolean }) => {
      infoCommand({ ...program.opts<RunOptions>(), json: commandOptions.json });
    });
}
