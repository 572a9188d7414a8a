#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import type { AuthorizationHandle } from '@credential-keeper/models';
import { CredentialError, type TokenOrchestrator } from '@credential-keeper/auth';
import { logError, logEvent, setupConsoleLogging } from '@credential-keeper/core';
import { loadKeeperConfig } from './config-loader.js';
import { createKeeper, type KeeperComponents } from './keeper-factory.js';
import { KeeperServer } from './server/keeper-server.js';
import { summarizeToken } from './tools/token-summary.js';
import { describeFailure } from './utils/responses.js';

// Global error handlers
process.on('uncaughtException', (error) => {
  console.error('Uncaught Exception:', error);
  logError('uncaught-exception', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled Rejection:', reason);
  logError('unhandled-rejection', reason);
  process.exit(1);
});

interface GlobalOptions {
  envFile?: string;
}

const program = new Command();

program
  .name('credential-keeper')
  .description('Keeps Google Ads OAuth credentials valid and serves them to MCP clients')
  .option('--env-file <path>', 'read configuration from this .env file instead of ./.env')
  .showHelpAfterError();

function keeper(options: { memory?: boolean } = {}): KeeperComponents {
  const { envFile } = program.opts<GlobalOptions>();
  const config = loadKeeperConfig({ envFile });
  return createKeeper(config, { store: options.memory ? 'memory' : 'file' });
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function promptForAuthorization(handle: AuthorizationHandle): void {
  console.error(chalk.yellow.bold('\nAuthorization required'));
  console.error(`Open this URL in a browser to continue:\n${chalk.cyan(handle.authorizationUrl)}\n`);
  console.error(chalk.dim('Waiting for the authorization to complete (Ctrl+C to cancel)...'));
}

/**
 * Runs a token-producing command; Ctrl+C abandons a pending authorization.
 */
async function withToken(run: (orchestrator: TokenOrchestrator, signal: AbortSignal) => Promise<string>) {
  const { orchestrator } = keeper();
  const controller = new AbortController();
  const onInterrupt = () => controller.abort(new Error('interrupted'));
  process.once('SIGINT', onInterrupt);
  try {
    const before = await orchestrator.checkStatus();
    await run(orchestrator, controller.signal);
    const after = await orchestrator.checkStatus();
    printJson(summarizeToken(after, before.expiresAt !== after.expiresAt));
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

/**
 * Prints a failure with its code and suggested action, then exits with 1.
 */
function fail(command: string, error: unknown): never {
  const failure = describeFailure(error);
  // written directly: serve routes console output through pino
  process.stderr.write(`${chalk.red(`${command} failed [${failure.code}]: ${failure.message}`)}\n`);
  if (failure.action) {
    process.stderr.write(`${chalk.yellow(failure.action)}\n`);
  }
  logError(`cli-${command}`, error, { code: failure.code });
  process.exit(1);
}

function action<Args extends unknown[]>(command: string, run: (...args: Args) => Promise<void>) {
  return async (...args: Args) => {
    try {
      await run(...args);
    } catch (error) {
      fail(command, error);
    }
  };
}

let serverInstance: KeeperServer | undefined;
let isShuttingDown = false;

async function handleShutdown(signal: string) {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logEvent('info', 'cli:shutdown', { signal, exit_code: 0 });
  if (serverInstance) {
    await serverInstance.shutdown();
  }
  process.exit(0);
}

program
  .command('serve')
  .description('Run the MCP server on stdio')
  .option('--memory', 'keep credentials in memory only')
  .action(
    action('serve', async (options: { memory?: boolean }) => {
      // stdout carries the protocol from here on; console output goes through pino
      setupConsoleLogging();
      const components = keeper(options);
      const server = new KeeperServer({
        ...components,
        notice: (message) => process.stderr.write(`${chalk.yellow(message)}\n`),
      });
      serverInstance = server;
      process.once('SIGINT', () => void handleShutdown('SIGINT'));
      process.once('SIGTERM', () => void handleShutdown('SIGTERM'));
      await server.start();
      process.stderr.write(`${chalk.green('[keeper] MCP server ready on stdio')}\n`);
    }),
  );

program
  .command('status')
  .description('Show the state of the stored credentials')
  .action(
    action('status', async () => {
      printJson(await keeper().orchestrator.checkStatus());
    }),
  );

program
  .command('login')
  .description('Make sure a valid token is stored, authorizing in the browser if needed')
  .action(
    action('login', () =>
      withToken((orchestrator, signal) =>
        orchestrator.ensureToken({ signal, onAuthorizationRequired: promptForAuthorization }),
      ),
    ),
  );

program
  .command('refresh')
  .description('Replace the stored access token now')
  .action(
    action('refresh', () =>
      withToken((orchestrator, signal) =>
        orchestrator.forceRefresh({ signal, onAuthorizationRequired: promptForAuthorization }),
      ),
    ),
  );

program
  .command('logout')
  .description('Delete the stored credentials')
  .action(
    action('logout', async () => {
      const { orchestrator } = keeper();
      await orchestrator.clearCredentials();
      const { credentialsPath } = await orchestrator.checkStatus();
      console.error(chalk.green(`Removed credentials at ${credentialsPath}`));
    }),
  );

program
  .command('endpoints')
  .description('Show the OAuth helper endpoints')
  .action(
    action('endpoints', async () => {
      printJson(keeper().orchestrator.getOAuthEndpoints());
    }),
  );

/**
 * Initializes the CLI application and parses command-line arguments.
 */
async function bootstrap(): Promise<void> {
  if (!process.env.KEEPER_RUN_ID) {
    process.env.KEEPER_RUN_ID = `${Date.now()}-${process.pid}`;
  }

  logEvent('info', 'cli:start', { argv: process.argv, cwd: process.cwd() });

  await program.parseAsync(process.argv);
}

bootstrap().catch((error: unknown) => {
  if (CredentialError.is(error)) {
    fail('startup', error);
  }
  console.error('Fatal error:', error);
  logError('main-fatal', error);
  process.exit(1);
});
