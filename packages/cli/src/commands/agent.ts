import { Command } from 'commander';
import chalk from 'chalk';
import { MetricsAgent, generateToken } from '@fleetwatch/agent';
import { loadConfig } from '@fleetwatch/core';
import { getLogger } from '@fleetwatch/shared';
import { globalOptions, reportError, setupLogging } from '../utils/cli.js';
import { parsePort } from '../utils/options.js';

interface AgentCommandOptions {
  host?: string;
  port?: number;
}

const tokenCommand = new Command('token')
  .description('Print a random token for agent.tokens and auth.token')
  .action(() => {
    console.log(generateToken());
  });

export const agentCommand = new Command('agent')
  .option('--host <address>', 'Address to listen on')
  .option('-p, --port <port>', 'Port to listen on', parsePort)
  .description('Run the metrics agent that answers CPU queries from pollers')
  .addCommand(tokenCommand)
  .action(async (options: AgentCommandOptions, command: Command) => {
    const globals = globalOptions(command);
    setupLogging(globals, 'info');

    try {
      const { config } = await loadConfig({ path: globals.config });
      const host = options.host ?? config.agent.host;
      const port = options.port ?? config.agent.port;
      // A poller's own token is accepted when the agent has none listed.
      const tokens =
        config.agent.tokens.length > 0 ? config.agent.tokens : config.auth ? [config.auth.token] : [];

      if (tokens.length === 0) {
        getLogger().warn('No agent tokens configured; every client will be accepted');
      }

      const agent = new MetricsAgent({ host, port, tokens });
      await agent.start();
      console.log(chalk.green(`\n  Metrics agent listening on ${host}:${port}`));
      console.log(chalk.gray('  Press Ctrl+C to stop\n'));

      const shutdown = (signal: NodeJS.Signals): void => {
        getLogger().info({ signal }, 'Stopping metrics agent');
        agent.stop().catch(reportError);
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    } catch (err) {
      reportError(err);
    }
  });
