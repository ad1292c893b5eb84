/**
 * Flight Deal Bot – Main Entry Point
 *
 * Standard: ein Lauf, dann Prozessende (für externen Cron / CI-Schedule).
 * Mit --schedule bleibt der Prozess aktiv und läuft nach RUN_SCHEDULE.
 */

import * as cron from 'node-cron';
import { aviasalesClientFromConfig, gatewayFromConfig, repositoryFromConfig } from './bootstrap';
import { loadConfig, logConfig, validateConfig } from './config';
import type { Config } from './config';
import { runDealCheck } from './run';

async function runOnce(config: Config): Promise<void> {
  console.log('');
  console.log('═══════════════════════════════════════════════════════════');
  console.log('✈️  Flight Deal Bot – Lauf gestartet');
  console.log('═══════════════════════════════════════════════════════════');
  console.log(`📅 Zeitpunkt: ${new Date().toISOString()}`);

  const gateway = gatewayFromConfig(config);
  await runDealCheck({
    adminChatId: config.adminChatId,
    repository: repositoryFromConfig(config),
    messenger: gateway,
    updateSource: gateway,
    priceSource: aviasalesClientFromConfig(config),
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  // Beendet den Prozess bei fehlendem AVIASALES_TOKEN, bevor State angefasst wird
  validateConfig(config);
  logConfig(config);

  if (!process.argv.includes('--schedule')) {
    await runOnce(config);
    console.log('[RUN] ✓ Fertig – beende Prozess');
    process.exit(0);
  }

  if (!cron.validate(config.runSchedule)) {
    console.error(`[RUN][FATAL] RUN_SCHEDULE ungültig: ${config.runSchedule}`);
    process.exit(1);
  }

  console.log(`[RUN] Modus: Scheduler (${config.runSchedule})`);

  // Läufe überlappen nie: ein Tick während eines Laufs wird ausgelassen
  let running = false;
  cron.schedule(config.runSchedule, async () => {
    if (running) {
      console.warn('[RUN][WARN] Vorheriger Lauf noch aktiv – Tick übersprungen');
      return;
    }
    running = true;
    try {
      await runOnce(config);
    } catch (err: unknown) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      console.error(`[RUN][ERROR] Lauf fehlgeschlagen: ${errorMessage}`);
    } finally {
      running = false;
    }
  });

  process.once('SIGINT', () => {
    console.log('\n[RUN] SIGINT empfangen – beende...');
    process.exit(0);
  });

  process.once('SIGTERM', () => {
    console.log('\n[RUN] SIGTERM empfangen – beende...');
    process.exit(0);
  });
}

main().catch((err: unknown) => {
  console.error('[RUN][FATAL] Unerwarteter Fehler:', err);
  process.exit(1);
});
