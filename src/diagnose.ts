// diagnose.ts - pre-deployment health check
import * as dotenv from 'dotenv';
import { pathToFileURL } from 'node:url';
import { detectArb } from './arbDetector.ts';
import { loadConfig, type Config, type Env } from './config.ts';
import { MockOddsSource } from './mockData.ts';
import { TelegramClient } from './notifications.ts';
import { TheOddsApiClient, type OddsSource } from './oddsService.ts';
import type { OddsApiEvent } from './types.ts';
import { errorMessage } from './utils.ts';

export type CheckStatus = 'PASS' | 'FAIL';

export interface DiagnosticResults {
  env: CheckStatus;
  telegram: CheckStatus;
  oddsApi: CheckStatus;
  math: CheckStatus;
}

// --- TEST 1: ENVIRONMENT VARIABLES ---
export function checkConfig(env: Env): { status: CheckStatus; config?: Config } {
  console.log('\n🔍 TEST 1: CONFIGURATION CHECK');
  try {
    const config = loadConfig(env);
    console.log('✅ Config Loaded Successfully');
    return { status: 'PASS', config };
  } catch (e) {
    console.error('❌ Config Failed:', errorMessage(e));
    return { status: 'FAIL' };
  }
}

// --- TEST 2: TELEGRAM CONNECTIVITY ---
export async function checkTelegram(client: Pick<TelegramClient, 'getMe'>): Promise<CheckStatus> {
  console.log('\n🔍 TEST 2: TELEGRAM BOT CONNECTION');
  try {
    const me = await client.getMe();
    console.log(`✅ Connected as Bot: @${me.username ?? me.id}`);
    return 'PASS';
  } catch (e) {
    console.error('❌ Telegram Failed:', errorMessage(e));
    return 'FAIL';
  }
}

// --- TEST 3: THE-ODDS-API CONNECTIVITY ---
export async function checkOddsApi(
  source: OddsSource,
  sportKey: string,
  options: { regions: string[]; markets: string[] },
): Promise<CheckStatus> {
  console.log('\n🔍 TEST 3: ODDS API ACCESS');
  try {
    const events = await source.fetchOdds(sportKey, options);
    console.log(`ℹ️ ${sportKey}: ${events.length} events`);
    console.log('✅ Odds API is reachable.');
    return 'PASS';
  } catch (e) {
    console.error('❌ Odds API Failed:', errorMessage(e));
    return 'FAIL';
  }
}

// --- TEST 4: MATH ENGINE ---
export function checkMath(): CheckStatus {
  console.log('\n🔍 TEST 4: ARB CALCULATION LOGIC');
  // Back A @ 2.10 on one book, B @ 2.05 on another: edge should be ~3.60%
  const event: OddsApiEvent = {
    id: 'diagnose',
    sport_key: 'diagnose',
    sport_title: 'Diagnose',
    commence_time: new Date().toISOString(),
    home_team: 'A',
    away_team: 'B',
    bookmakers: [
      { key: 'x', title: 'x', markets: [{ key: 'h2h', outcomes: [{ name: 'A', price: 2.1 }] }] },
      { key: 'y', title: 'y', markets: [{ key: 'h2h', outcomes: [{ name: 'B', price: 2.05 }] }] },
    ],
  };

  const arb = detectArb(event, { minEdgePercent: 0.5 });
  if (!arb) {
    console.error('❌ Math Logic Failed: expected an opportunity for 2.10 / 2.05');
    return 'FAIL';
  }

  console.log(`ℹ️ Calculated Edge: ${arb.edgePercent}%`);
  const payoutA = (arb.stakes.get('A') ?? 0) * 2.1;
  const payoutB = (arb.stakes.get('B') ?? 0) * 2.05;
  if (Math.abs(arb.edgePercent - 3.6005) > 0.001 || Math.abs(payoutA - payoutB) > 0.05) {
    console.error(`❌ Math Logic Failed: edge ${arb.edgePercent}%, payouts ${payoutA} / ${payoutB}`);
    return 'FAIL';
  }
  console.log('✅ Math Engine Verified');
  return 'PASS';
}

export async function runDiagnostics(env: Env): Promise<DiagnosticResults> {
  const results: DiagnosticResults = { env: 'FAIL', telegram: 'FAIL', oddsApi: 'FAIL', math: 'FAIL' };

  const { status, config } = checkConfig(env);
  results.env = status;

  if (config) {
    const telegram = new TelegramClient(config.telegramBotToken, config.telegramChatId, config.httpTimeoutSeconds);
    results.telegram = await checkTelegram(telegram);

    const sportKey = config.sports[0] ?? 'upcoming';
    const odds = config.mockMode
      ? new MockOddsSource()
      : new TheOddsApiClient(config.oddsApiKey, config.httpTimeoutSeconds);
    results.oddsApi = await checkOddsApi(odds, sportKey, { regions: config.regions, markets: config.markets });
  }

  results.math = checkMath();
  return results;
}

async function cli(): Promise<void> {
  dotenv.config();
  console.log('🏥 STARTING ARB-ALERT DIAGNOSTIC ROUTINE 🏥');
  console.log('==================================================');

  const results = await runDiagnostics(process.env);

  console.log('\n==================================================');
  console.log('📊 DIAGNOSTIC SUMMARY');
  console.table(results);

  if (Object.values(results).includes('FAIL')) {
    console.log('⚠️ SYSTEM UNHEALTHY - DO NOT DEPLOY');
    process.exitCode = 1;
  } else {
    console.log('🚀 SYSTEM HEALTHY - READY FOR DEPLOYMENT');
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  cli().catch((error: unknown) => {
    console.error('❌ Diagnostics crashed:', errorMessage(error));
    process.exitCode = 1;
  });
}
