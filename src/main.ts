// Main orchestration - polling loop and alerting

import * as dotenv from 'dotenv';
import { pathToFileURL } from 'node:url';
import { ConfigError, loadConfig, type Config, type Env } from './config.ts';
import { createLogger, setLogLevel } from './logger.ts';
import { banner } from './messages.ts';
import { MockOddsSource } from './mockData.ts';
import { TelegramClient } from './notifications.ts';
import { TheOddsApiClient, type OddsSource } from './oddsService.ts';
import { runLoop } from './scanner.ts';

const log = createLogger('main');

function buildOddsSource(config: Config): OddsSource {
  if (config.mockMode) {
    log.info('Running in MOCK_MODE - using test data');
    return new MockOddsSource();
  }
  return new TheOddsApiClient(config.oddsApiKey, config.httpTimeoutSeconds);
}

/**
 * Start the bot and run until the signal aborts.
 * Returns the process exit code: 1 when the configuration is unusable.
 */
export async function run(env: Env, signal: AbortSignal): Promise<number> {
  let config: Config;
  try {
    config = loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      log.error(`Configuration error: ${error.message}`);
      return 1;
    }
    throw error;
  }
  setLogLevel(config.logLevel);

  const sink = new TelegramClient(config.telegramBotToken, config.telegramChatId, config.httpTimeoutSeconds);
  const startup = banner(config);
  log.info(startup);

  await runLoop({
    oddsSource: buildOddsSource(config),
    sink,
    settings: {
      sports: config.sports,
      regions: config.regions,
      markets: config.markets,
      locale: config.locale,
      minEdgePercent: config.minEdgePercent,
      bookmakerWhitelist: config.bookmakerWhitelist,
      bankroll: config.bankroll,
    },
    pollSeconds: config.pollSeconds,
    banner: startup,
    signal,
  });

  log.info('Stopped.');
  return 0;
}

async function main(): Promise<void> {
  dotenv.config();

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    log.info(`${signal} received - stopping`);
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  process.exitCode = await run(process.env, controller.signal);
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error: unknown) => {
    log.error('Fatal error', error);
    process.exitCode = 1;
  });
}
