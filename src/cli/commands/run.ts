/**
 * Run Command - start an agent and keep it running until a shutdown signal
 */

import { Command } from 'commander';
import { loadServiceConfig, type ServiceConfig } from '../../config/index.js';
import { BasicIdentity, IdentityType, requireIdentity, runWithIdentity } from '../../auth/index.js';
import { getCode } from '../../errors/index.js';
import type { AgentInfo } from '../../lifecycle/index.js';
import { initLogger, type StructuredLogger } from '../../logging/logger.js';
import { type Execution, newExecution } from '../../models/index.js';
import { agentBuilderFromConfig } from '../agent-factory.js';

const EXECUTION_NAMESPACE = 'default';

export type RunOptions = {
  config?: string;
  envPrefix?: string;
  verbose?: boolean;
  color?: boolean;
};

/**
 * Resolves with the name of the first SIGINT or SIGTERM received
 */
export function waitForShutdownSignal(): Promise<string> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  });
}

/**
 * Build and start the configured agent, wait for `shutdown`, then stop it.
 *
 * @returns Info snapshot taken after the agent stopped
 */
export async function runAgent(
  config: ServiceConfig,
  shutdown: Promise<string>,
  logger: StructuredLogger,
): Promise<AgentInfo> {
  const agent = agentBuilderFromConfig(config.agent, logger)
    .withOnStart(() => {
      logger.info('startup hook: initializing resources');
    })
    .withOnStop(() => {
      logger.info('shutdown hook: releasing resources');
    })
    .onStateChange((from, to) => {
      logger.info('state transition', { from, to });
    })
    .build();

  await agent.start();

  try {
    await agent.health();
    logger.info('health check passed');
  } catch (error) {
    logger.error('health check failed', { error });
  }

  const info = agent.getInfo();
  logger.info('agent info', {
    id: info.id,
    name: info.name,
    state: info.state,
    capabilities: info.capabilities.length,
  });

  // The agent serves on its own behalf
  const identity = new BasicIdentity(info.id, IdentityType.Agent, { name: info.name });
  runWithIdentity(identity, () => recordExecution(logger));

  const signal = await shutdown;
  logger.info('received signal, shutting down', { signal });

  await agent.stop();
  logger.info('agent stopped successfully');

  return agent.getInfo();
}

function recordExecution(logger: StructuredLogger): Execution {
  const identity = requireIdentity();
  logger.info('identity in context', { identityId: identity.id, identityType: identity.type });

  const execution = newExecution(identity.id, 'serve until shutdown', EXECUTION_NAMESPACE);
  logger.info('execution created', {
    executionId: execution.id,
    identityId: execution.identityId,
    status: execution.status,
  });
  return execution;
}

/**
 * Execute the run command
 */
export async function runCommand(options: RunOptions): Promise<void> {
  const config = loadServiceConfig({ file: options.config, envPrefix: options.envPrefix });

  const logger = initLogger({
    level: config.logging.level,
    filePath: config.logging.filePath,
    consoleOutput: config.logging.consoleOutput,
    json: config.logging.json,
    verbose: options.verbose,
    noColor: options.color === false,
  });

  try {
    await runAgent(config, waitForShutdownSignal(), logger);
  } catch (error) {
    logger.error('agent run failed', { code: getCode(error), error });
    process.exitCode = 1;
  }
}

/**
 * Register the run command with Commander
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Start the configured agent and run until SIGINT/SIGTERM')
    .action(async () => {
      await runCommand(program.opts<RunOptions>());
    })
    .addHelpText(
      'after',
      `
Examples:
  $ agentcore run                          # Defaults and AGENTCORE_* variables
  $ agentcore --config agent.yaml run      # Load a configuration file
  $ agentcore --env-prefix ORDERS run      # Read ORDERS_AGENT_ID etc.
`,
    );
}
