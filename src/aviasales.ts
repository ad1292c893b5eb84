/**
 * Aviasales-Client – Preise pro Abflugtag (prices_for_dates)
 */

import { z } from 'zod';
import { errorMessage, requestJson } from './http';
import type { PriceSource, Ticket, TicketQuery } from './types';

export const AVIASALES_BASE_URL = 'https://api.travelpayouts.com';
export const AVIASALES_LINK_BASE = 'https://www.aviasales.com';

const PRICES_FOR_DATES_PATH = '/aviasales/v3/prices_for_dates';

const TicketSchema = z.object({
  origin: z.string().optional(),
  destination: z.string().optional(),
  departure_at: z.string().optional(),
  price: z.number().optional(),
  // Aviasales liefert je nach Endpoint duration_to oder duration
  duration_to: z.number().nullable().optional(),
  duration: z.number().nullable().optional(),
  airline: z.string().optional(),
  flight_number: z.union([z.string(), z.number()]).optional(),
  transfers: z.number().int().optional(),
  link: z.string().optional(),
});

export type AviasalesTicket = z.infer<typeof TicketSchema>;

const PricesResponseSchema = z.object({
  success: z.boolean(),
  data: z.array(z.unknown()).optional(),
});

export function toTicket(raw: AviasalesTicket): Ticket {
  return {
    origin: raw.origin,
    destination: raw.destination,
    departureAt: raw.departure_at,
    price: raw.price,
    durationMinutes: raw.duration_to || raw.duration || undefined,
    airline: raw.airline,
    flightNumber: raw.flight_number === undefined ? undefined : String(raw.flight_number),
    transfers: raw.transfers,
    link: raw.link,
  };
}

/**
 * Validiert die Antwort. `success: false` bedeutet: Daten nicht vertrauen.
 * Einzelne kaputte Tickets werden übersprungen.
 */
export function parsePricesResponse(body: unknown): Ticket[] {
  const parsed = PricesResponseSchema.safeParse(body);
  if (!parsed.success) {
    console.warn('[AVIASALES][WARN] Unerwartetes Antwortformat');
    return [];
  }
  if (!parsed.data.success) {
    return [];
  }

  const tickets: Ticket[] = [];
  let skipped = 0;
  for (const row of parsed.data.data ?? []) {
    const ticket = TicketSchema.safeParse(row);
    if (ticket.success) {
      tickets.push(toTicket(ticket.data));
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    console.warn(`[AVIASALES][WARN] ${skipped} Ticket(s) mit ungültigem Format übersprungen`);
  }
  return tickets;
}

export class AviasalesClient implements PriceSource {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(args: { token: string; baseUrl?: string; timeoutMs: number }) {
    this.token = args.token;
    this.baseUrl = (args.baseUrl ?? AVIASALES_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = args.timeoutMs;
  }

  buildUrl(query: TicketQuery): string {
    const params = new URLSearchParams({
      origin: query.origin,
      departure_at: query.departureDate,
      one_way: 'true',
      currency: query.currency,
      market: query.market,
      limit: String(query.limit),
      sorting: 'price',
      token: this.token,
    });
    if (query.directOnly) params.set('direct', 'true');

    return `${this.baseUrl}${PRICES_FOR_DATES_PATH}?${params.toString()}`;
  }

  /**
   * Netzwerk- und HTTP-Fehler ergeben eine leere Liste ("keine Daten in dieser Runde")
   */
  async fetchTickets(query: TicketQuery): Promise<Ticket[]> {
    try {
      const body = await requestJson(this.buildUrl(query), {
        method: 'GET',
        headers: { Accept: 'application/json' },
        timeoutMs: this.timeoutMs,
      });
      return parsePricesResponse(body);
    } catch (e: unknown) {
      console.error(`[AVIASALES][ERROR] ${query.origin} ${query.departureDate}: ${errorMessage(e)}`);
      return [];
    }
  }
}
