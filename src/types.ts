/**
 * Flight Deal Bot – Type Definitions
 *
 * Domain-Style: camelCase. Das persistierte JSON-Dokument nutzt snake_case,
 * die Übersetzung passiert ausschließlich in stateCodec.ts.
 */

/**
 * Per-User Suchparameter (effektive Werte = Defaults + Overrides)
 */
export interface UserSettings {
  origin: string;
  daysAhead: number;
  basePrice: number;
  baseDurationMinutes: number;
  priceIncrement: number;
  incrementMinutes: number;
  currency: string;
  market: string;
  limit: number;
  directOnly: boolean;
}

/**
 * Nur explizit gesetzte Felder eines Users
 */
export type SettingsOverrides = Partial<UserSettings>;

/**
 * Ticket wie von der Preisquelle geliefert, alle Felder optional
 */
export interface Ticket {
  origin?: string;
  destination?: string;
  departureAt?: string;
  price?: number;
  durationMinutes?: number;
  airline?: string;
  flightNumber?: string;
  transfers?: number;
  link?: string;
}

/**
 * Ticket, das den Schwellwert unterschreitet
 */
export interface Deal {
  origin: string;
  destination: string;
  departureAt: string;
  price: number;
  currency: string;
  durationMinutes: number;
  threshold: number;
  airline: string;
  flightNumber: string;
  transfers: number;
  link: string;
}

export interface UserRecord {
  name: string;
  settings: SettingsOverrides;
  // FIFO, älteste zuerst
  sentDeals: string[];
}

export interface PendingRequest {
  name: string;
  username: string;
}

/**
 * Gesamter Zustand eines Laufs. Eine Chat-ID steht nie gleichzeitig
 * in `users` und `pending`.
 */
export interface AppState {
  users: Map<string, UserRecord>;
  pending: Map<string, PendingRequest>;
  lastUpdateId: number;
}

/**
 * Eingehende Text-Nachricht aus der Telegram-Queue
 */
export interface InboundMessage {
  chatId: string;
  text: string;
  firstName: string;
  username: string;
}

/**
 * Ein Update der Queue. `message` ist null für Updates ohne Text
 * (Sticker, Beitritte, …), die trotzdem den Cursor weiterschieben.
 */
export interface InboundUpdate {
  updateId: number;
  message: InboundMessage | null;
}

export interface SendOptions {
  markdown?: boolean;
}

/**
 * Ergebnis eines Sendevorgangs
 */
export interface SendResult {
  success: boolean;
  messageId: number | null;
  error: string | null;
}

export interface Messenger {
  send(chatId: string, text: string, options?: SendOptions): Promise<SendResult>;
}

export interface UpdateSource {
  fetchUpdates(afterUpdateId: number): Promise<InboundUpdate[]>;
}

export interface TicketQuery {
  origin: string;
  departureDate: string;
  currency: string;
  market: string;
  limit: number;
  directOnly: boolean;
}

export interface PriceSource {
  fetchTickets(query: TicketQuery): Promise<Ticket[]>;
}
