#!/usr/bin/env node
/**
 * FeedSim command line
 *
 *   feedsim run --config config/config.example.json
 *   feedsim serve --port 3000
 */

import { program } from 'commander';
import { loadConfig } from './config/schema.js';
import { applyOverrides } from './config/overrides.js';
import { ConfigError, errorMessage } from './errors.js';
import { HttpContentService } from './service/client.js';
import { createModelRouter } from './models/router.js';
import { createStorage, type SQLiteStorage } from './storage/sqlite.js';
import { loadPopulationSnapshot, savePopulationSnapshot, toSnapshot } from './storage/snapshot.js';
import { runSimulation } from './simulation/tick.js';
import { formatSummary } from './simulation/summary.js';
import { startServer } from './api/server.js';
import { createLogger, isLogLevel, setLogLevel } from './utils/logger.js';

const log = createLogger('CLI');

interface RunOptions {
  config: string;
  population?: string;
  reset: boolean;
  contentRecsys?: string;
  followRecsys?: string;
  seed?: string;
  days?: string;
  sequential: boolean;
  db: string;
  savePopulation?: string;
}

async function runCommand(opts: RunOptions): Promise<void> {
  const snapshot = opts.population ? loadPopulationSnapshot(opts.population) : undefined;
  const base = loadConfig(opts.config);
  const config = applyOverrides(base, {
    ...opts,
    // A restored population continues with its own seed unless one is given
    seed: opts.seed ?? (snapshot ? String(snapshot.seed) : undefined),
  });

  const storage: SQLiteStorage = createStorage(opts.db);
  if (opts.reset) {
    await storage.reset();
    log.info(`Cleared run database ${opts.db}`);
  }

  const service = new HttpContentService(config.servers.api);
  const router = createModelRouter({
    llmUrl: config.servers.llm,
    llmApiKey: config.servers.llmApiKey,
    anthropicApiKey: config.servers.anthropicApiKey,
    temperature: config.servers.temperature,
    maxTokens: config.servers.maxTokens,
  });

  const runId = await storage.createRun(config);
  log.info(`Run ${runId} started (seed ${config.seed}, content=${config.recsys.content}, follow=${config.recsys.follow})`);

  try {
    const result = await runSimulation(
      { config, service, backend: router },
      {
        population: snapshot,
        resetService: opts.reset,
        onSlot: (report) => storage.recordSlot(runId, report),
        onDay: async (report) => {
          await storage.recordDay(runId, report);
          log.info(
            `Day ${report.day} done: ${report.populationBefore} → ${report.populationAfter} ` +
              `(-${report.churned.length} +${report.recruited.length}), ${report.dailyActive} active`
          );
        },
      }
    );

    await storage.saveActors(runId, result.registry.all());
    await storage.saveEdges(runId, result.graph.edges());
    await storage.finishRun(runId, 'completed', result.summary);

    if (opts.savePopulation) {
      savePopulationSnapshot(
        opts.savePopulation,
        toSnapshot(config.seed, result.registry.all(), result.graph.edges(), result.issuedIds, result.nextSlot)
      );
      log.info(`Population saved to ${opts.savePopulation}`);
    }

    console.log(formatSummary(result.summary));
    console.log('');
    console.log(router.getUsageSummary());
  } catch (error) {
    await storage.finishRun(runId, 'failed', undefined, errorMessage(error));
    throw error;
  } finally {
    storage.close();
  }
}

program
  .name('feedsim')
  .description('Time-stepped social network population simulator')
  .version('0.1.0')
  .option('--log-level <level>', 'debug | info | warn | error', process.env.FEEDSIM_LOG_LEVEL ?? 'info')
  .hook('preAction', (cmd) => {
    const level = String(cmd.opts().logLevel);
    if (isLogLevel(level)) setLogLevel(level);
    else log.warn(`Unknown log level "${level}"; keeping info`);
  });

program
  .command('run')
  .description('Run a simulation against the content service and language backend')
  .requiredOption('-c, --config <path>', 'Simulation config file (JSON)')
  .option('-p, --population <path>', 'Start from a saved population snapshot')
  .option('--reset', 'Reset the content service and the run database first', false)
  .option('--content-recsys <strategy>', 'Content recommender strategy')
  .option('--follow-recsys <strategy>', 'Follow recommender strategy')
  .option('--seed <n>', 'Random seed')
  .option('--days <n>', 'Number of days to simulate')
  .option('--sequential', 'Run every action one at a time', false)
  .option('--db <path>', 'Run database', process.env.FEEDSIM_DB ?? 'feedsim.db')
  .option('--save-population <path>', 'Write the final population snapshot here')
  .action(async (opts: RunOptions) => {
    try {
      await runCommand(opts);
    } catch (error) {
      if (error instanceof ConfigError) {
        console.error(error.message);
      } else {
        log.error(`Run failed: ${errorMessage(error)}`);
      }
      process.exitCode = 1;
    }
  });

program
  .command('serve')
  .description('Serve the monitoring API over the run database')
  .option('--port <n>', 'Port to listen on', process.env.PORT ?? '3000')
  .option('--db <path>', 'Run database', process.env.FEEDSIM_DB ?? 'feedsim.db')
  .action((opts: { port: string; db: string }) => {
    const port = parseInt(opts.port, 10);
    if (!Number.isInteger(port) || port <= 0) {
      console.error(`Invalid port "${opts.port}"`);
      process.exitCode = 1;
      return;
    }
    startServer({ storage: createStorage(opts.db) }, port);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  log.error(errorMessage(error));
  process.exitCode = 1;
});
