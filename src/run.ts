/**
 * Ein kompletter Lauf: State laden → Commands → Suche pro User → State speichern
 */

import { processUpdates } from './commandRouter';
import { buildDealReport } from './reporter';
import { searchForUser } from './search';
import { ADMIN_DEFAULT_NAME } from './stateCodec';
import type { StateRepository } from './stateStore';
import type { AppState, Messenger, PriceSource, UpdateSource } from './types';

export interface RunDependencies {
  adminChatId: string;
  repository: StateRepository;
  messenger: Messenger;
  updateSource: UpdateSource;
  priceSource: PriceSource;
  now?: () => Date;
}

export interface RunSummary {
  updatesProcessed: number;
  usersSearched: number;
  dealsSent: number;
  failedUsers: string[];
}

/**
 * Der konfigurierte Admin ist immer freigeschaltet
 */
export function ensureAdminUser(state: AppState, adminChatId: string): void {
  if (!adminChatId) {
    return;
  }
  if (!state.users.has(adminChatId)) {
    state.users.set(adminChatId, { name: ADMIN_DEFAULT_NAME, settings: {}, sentDeals: [] });
    console.log(`[RUN] Admin ${adminChatId} als Nutzer angelegt`);
  }
  state.pending.delete(adminChatId);
}

export async function runDealCheck(deps: RunDependencies): Promise<RunSummary> {
  const now = deps.now ?? (() => new Date());
  const summary: RunSummary = { updatesProcessed: 0, usersSearched: 0, dealsSent: 0, failedUsers: [] };

  const state = await deps.repository.load();
  ensureAdminUser(state, deps.adminChatId);

  const updates = await deps.updateSource.fetchUpdates(state.lastUpdateId);
  summary.updatesProcessed = await processUpdates(state, updates, {
    messenger: deps.messenger,
    adminChatId: deps.adminChatId,
  });

  console.log(`[SEARCH] Suche für ${state.users.size} Nutzer…`);
  const today = now();

  for (const [chatId, user] of state.users) {
    summary.usersSearched++;
    try {
      const { ledger, fresh } = await searchForUser(user, deps.priceSource, today);
      console.log(`[SEARCH] ${user.name || chatId}: ${fresh.length} neue(r) Deal(s)`);
      if (fresh.length === 0) {
        continue;
      }

      const report = buildDealReport(fresh.map((entry) => entry.deal));
      const result = await deps.messenger.send(chatId, report);
      if (!result.success) {
        // Nicht markieren: beim nächsten Lauf erneut versuchen
        console.warn(`[SEARCH][WARN] Report an ${chatId} nicht zugestellt: ${result.error ?? 'unbekannt'}`);
        continue;
      }

      ledger.record(fresh.map((entry) => entry.fingerprint));
      user.sentDeals = ledger.toArray();
      summary.dealsSent += fresh.length;
    } catch (error: unknown) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.error(`[SEARCH][ERROR] Fehler für ${chatId}: ${errorMessage}`);
      summary.failedUsers.push(chatId);
    }
  }

  await deps.repository.save(state);
  console.log(
    `[RUN] Fertig: ${summary.usersSearched} Nutzer, ${summary.dealsSent} Deal(s) gesendet, ${summary.failedUsers.length} Fehler`
  );
  return summary;
}
