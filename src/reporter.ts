/**
 * Deal-Report: rendert neue Deals als eine Telegram-Nachricht
 */

import { AVIASALES_LINK_BASE } from './aviasales';
import { cutAtCodePoint } from './telegram';
import type { Deal } from './types';

// Etwas Buffer unter dem Telegram-Limit für den Footer
export const MAX_REPORT_LENGTH = 4000;
export const TRUNCATION_MARKER = '\n…';

/**
 * 85 → "1h25m", 600 → "10h00m"
 */
export function formatDuration(minutes: number): string {
  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;
  return `${hours}h${String(rest).padStart(2, '0')}m`;
}

/**
 * Lokale Abflugzeit wie geliefert: "2026-10-20T06:15:00+02:00" → "2026-10-20 06:15"
 */
export function formatDeparture(departureAt: string): string {
  return departureAt ? departureAt.slice(0, 16).replace('T', ' ') : '?';
}

export function formatStops(transfers: number): string {
  if (transfers === 0) return 'direkt';
  return transfers === 1 ? '1 Umstieg' : `${transfers} Umstiege`;
}

export function formatDeal(deal: Deal): string {
  const link = deal.link ? `\n${AVIASALES_LINK_BASE}${deal.link}` : '';
  return [
    `✈️ ${deal.origin} → ${deal.destination}`,
    `   ${formatDeparture(deal.departureAt)} | ${formatDuration(deal.durationMinutes)} | ${formatStops(deal.transfers)}`,
    `   💰 ${deal.price} ${deal.currency} (Limit ${deal.threshold.toFixed(0)} ${deal.currency})`,
    `   ${deal.airline} ${deal.flightNumber}${link}`,
  ].join('\n');
}

/**
 * Erwartet Deals bereits aufsteigend nach Preis sortiert. Zu lange Reports
 * werden gekürzt und mit "…" markiert, nie auf mehrere Nachrichten verteilt.
 * Ergebnis ist höchstens `maxLength` lang (eine Einheit kürzer, wenn sonst ein
 * Emoji zerschnitten würde).
 */
export function buildDealReport(deals: readonly Deal[], maxLength: number = MAX_REPORT_LENGTH): string {
  const header = deals.length === 1 ? '🔥 1 neuer günstiger Flug!\n\n' : `🔥 ${deals.length} neue günstige Flüge!\n\n`;
  const body = deals.map(formatDeal).join('\n\n');
  const text = header + body;

  if (text.length <= maxLength) {
    return text;
  }
  return cutAtCodePoint(text, maxLength - TRUNCATION_MARKER.length) + TRUNCATION_MARKER;
}
