#!/usr/bin/env node
/**
 * DDR Timer Sync CLI.
 *
 * Runs the service, performs one-shot syncs and lists the control-app
 * registry from the command line.
 *
 * @module ddr-timer-sync/cli
 */

import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { createLogger, startApp } from './app.js';
import { createAppContext, rebuildRegistry, type AppContext } from './context.js';
import { ConfigStore } from './core/config/store.js';
import { safeParseConfig, validateTimerSync } from './core/config/schema.js';
import { errorMessage } from './core/errors.js';

// ============================================================================
// CLI Setup
// ============================================================================

const program = new Command();

program
  .name('ddr-timer-sync')
  .description('Mirror TriCaster DDR clip durations onto Singular timer fields')
  .version('0.1.0');

const DEFAULT_CONFIG = './config/config.yaml';

/**
 * Load configuration and build services without the web server.
 */
async function loadContext(configPath: string): Promise<AppContext> {
  const store = await ConfigStore.load(configPath);
  const config = store.get();
  const logger = createLogger(config.logging.level, config.logging.prettyPrint);
  return createAppContext(store, logger);
}

function parseSlotArgument(value: string): number {
  const slot = Number(value);
  if (!Number.isInteger(slot) || slot < 1) {
    throw new Error(`Invalid DDR number: ${value}`);
  }
  return slot;
}

// ============================================================================
// Start Command
// ============================================================================

program
  .command('start')
  .description('Start the DDR Timer Sync service')
  .option('-c, --config <path>', 'Path to configuration file', DEFAULT_CONFIG)
  .action(async (options: { config: string }) => {
    const { context, shutdown } = await startApp({ configPath: options.config });

    const handleSignal = async (signal: string) => {
      context.logger.info({ signal }, 'Shutdown signal received');
      await shutdown();
      process.exit(0);
    };

    process.on('SIGINT', () => void handleSignal('SIGINT'));
    process.on('SIGTERM', () => void handleSignal('SIGTERM'));
  });

// ============================================================================
// Sync Command
// ============================================================================

program
  .command('sync [slot]')
  .description('Push DDR durations to the timer fields once (all configured DDRs by default)')
  .option('-c, --config <path>', 'Path to configuration file', DEFAULT_CONFIG)
  .action(async (slot: string | undefined, options: { config: string }) => {
    const context = await loadContext(options.config);

    try {
      const result =
        slot === undefined
          ? await context.orchestrator.syncAll()
          : await context.orchestrator.syncOne(parseSlotArgument(slot));

      console.log(JSON.stringify(result, null, 2));

      if ('errors' in result && !result.ok) {
        process.exitCode = 1;
      }
    } catch (error) {
      context.logger.error({ error: errorMessage(error) }, 'Sync failed');
      process.exitCode = 1;
    }
  });

// ============================================================================
// List Command
// ============================================================================

program
  .command('list')
  .description('List subcompositions of every configured control app')
  .option('-c, --config <path>', 'Path to configuration file', DEFAULT_CONFIG)
  .action(async (options: { config: string }) => {
    const context = await loadContext(options.config);
    await rebuildRegistry(context);

    for (const app of context.registry.appNames()) {
      const error = context.registry.lastError(app);
      if (error) {
        console.log(`${app}: ${error}`);
        continue;
      }
      console.log(`${app}:`);
      for (const entry of context.registry.list().filter((item) => item.app === app)) {
        console.log(`  ${entry.slug.padEnd(28)} ${entry.name} (${entry.id})`);
      }
    }
  });

// ============================================================================
// Validate Config Command
// ============================================================================

program
  .command('validate-config')
  .description('Validate configuration file')
  .option('-c, --config <path>', 'Path to configuration file', DEFAULT_CONFIG)
  .action(async (options: { config: string }) => {
    const logger = createLogger('info', true);

    try {
      const configPath = resolve(options.config);

      if (!existsSync(configPath)) {
        logger.error({ path: configPath }, 'Configuration file not found');
        process.exit(1);
      }

      logger.info({ path: configPath }, 'Validating configuration');

      const content = await readFile(configPath, 'utf-8');
      const result = safeParseConfig(parseYaml(content) ?? {});

      if (!result.success) {
        logger.error('Configuration validation failed:');
        for (const issue of result.error.issues) {
          logger.error(`  ${issue.path.join('.')}: ${issue.message}`);
        }
        process.exit(1);
      }

      // Incomplete DDR field sets are reported but do not fail validation
      for (const warning of validateTimerSync(result.data)) {
        logger.warn(`  ${warning}`);
      }

      logger.info('Configuration valid');
      console.log('\nParsed configuration:');
      console.log(JSON.stringify(result.data, null, 2));
    } catch (error) {
      logger.fatal({ error }, 'Failed to validate configuration');
      process.exit(1);
    }
  });

// ============================================================================
// Entry Point
// ============================================================================

await program.parseAsync();
