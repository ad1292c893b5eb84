/**
 * Deal-Filter: Tickets → Deals unterhalb des Per-User-Schwellwerts
 */

import { maxPriceForDuration } from './threshold';
import type { Deal, Ticket, UserSettings } from './types';

export const UNKNOWN_DESTINATION = '???';

/**
 * Reine Transformation, keine Seiteneffekte. Tickets ohne positive Dauer
 * oder ohne gültigen Preis werden verworfen.
 */
export function filterDeals(tickets: readonly Ticket[], settings: UserSettings): Deal[] {
  const deals: Deal[] = [];

  for (const ticket of tickets) {
    const duration = ticket.durationMinutes ?? 0;
    if (!(duration > 0)) {
      continue;
    }

    const price = ticket.price;
    if (price === undefined || !Number.isFinite(price)) {
      continue;
    }

    const threshold = maxPriceForDuration(duration, settings);
    if (price > threshold) {
      continue;
    }

    deals.push({
      origin: ticket.origin || settings.origin,
      destination: ticket.destination || UNKNOWN_DESTINATION,
      departureAt: ticket.departureAt ?? '',
      price,
      currency: settings.currency.toUpperCase(),
      durationMinutes: duration,
      threshold,
      airline: ticket.airline ?? '',
      flightNumber: ticket.flightNumber ?? '',
      transfers: ticket.transfers ?? 0,
      link: ticket.link ?? '',
    });
  }

  return deals;
}
