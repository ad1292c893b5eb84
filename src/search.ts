/**
 * Suche pro User: alle Tage des Horizonts abfragen, filtern, gegen den Ledger prüfen
 */

import { filterDeals } from './dealFilter';
import { SentDealLedger } from './dedup';
import type { FingerprintedDeal } from './dedup';
import { MAX_DAYS_AHEAD, effectiveSettings } from './settings';
import type { PriceSource, UserRecord, UserSettings } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * UTC-Kalendertage ab `today` (inklusive), als YYYY-MM-DD.
 * Höchstens MAX_DAYS_AHEAD, auch wenn der gespeicherte State mehr verlangt.
 */
export function searchDates(today: Date, daysAhead: number): string[] {
  const start = Date.UTC(today.getUTCFullYear(), today.getUTCMonth(), today.getUTCDate());
  const days = Math.min(daysAhead, MAX_DAYS_AHEAD);
  const dates: string[] = [];
  for (let offset = 0; offset < days; offset++) {
    dates.push(new Date(start + offset * DAY_MS).toISOString().slice(0, 10));
  }
  return dates;
}

export interface UserSearchResult {
  settings: UserSettings;
  ledger: SentDealLedger;
  // aufsteigend nach Preis
  fresh: FingerprintedDeal[];
}

/**
 * Sequenziell, ein Request pro Tag. Deals, die an mehreren Tagen auftauchen,
 * zählen nur einmal.
 */
export async function searchForUser(user: UserRecord, priceSource: PriceSource, today: Date): Promise<UserSearchResult> {
  const settings = effectiveSettings(user.settings);
  const ledger = new SentDealLedger(user.sentDeals);
  const seen = new Set<string>();
  const fresh: FingerprintedDeal[] = [];

  for (const departureDate of searchDates(today, settings.daysAhead)) {
    const tickets = await priceSource.fetchTickets({
      origin: settings.origin,
      departureDate,
      currency: settings.currency,
      market: settings.market,
      limit: settings.limit,
      directOnly: settings.directOnly,
    });

    for (const candidate of ledger.selectNew(filterDeals(tickets, settings))) {
      if (seen.has(candidate.fingerprint)) continue;
      seen.add(candidate.fingerprint);
      fresh.push(candidate);
    }
  }

  fresh.sort((a, b) => a.deal.price - b.deal.price);
  return { settings, ledger, fresh };
}
