/**
 * State-Codec: JSON-Dokument (snake_case) ⇄ AppState (camelCase)
 *
 * Liest auch das alte Single-User-Format `{ settings, sent_deals, last_update_id }`
 * und migriert es auf das Multi-User-Format mit dem Admin als einzigem Nutzer.
 */

import { z } from 'zod';
import type { AppState, PendingRequest, SettingsOverrides, UserRecord } from './types';

export const ADMIN_DEFAULT_NAME = 'Admin';

// Einzelne kaputte Felder fallen weg, statt das ganze Dokument zu verwerfen
const PersistedSettingsSchema = z.object({
  origin: z.string().optional().catch(undefined),
  days_ahead: z.number().int().optional().catch(undefined),
  base_price_eur: z.number().optional().catch(undefined),
  base_duration_minutes: z.number().optional().catch(undefined),
  price_increment_eur: z.number().optional().catch(undefined),
  increment_minutes: z.number().positive().optional().catch(undefined),
  currency: z.string().optional().catch(undefined),
  market: z.string().optional().catch(undefined),
  limit: z.number().int().optional().catch(undefined),
  direct_only: z.boolean().optional().catch(undefined),
});

export type PersistedSettings = z.infer<typeof PersistedSettingsSchema>;

const PersistedUserSchema = z.object({
  name: z.string().catch('?'),
  settings: PersistedSettingsSchema.catch({}),
  sent_deals: z.array(z.string()).catch([]),
});

export type PersistedUser = z.infer<typeof PersistedUserSchema>;

const PersistedPendingSchema = z.object({
  name: z.string().catch('?'),
  username: z.string().catch(''),
});

const PersistedStateSchema = z.object({
  users: z.record(z.string(), PersistedUserSchema),
  pending: z.record(z.string(), PersistedPendingSchema).catch({}),
  last_update_id: z.number().int().catch(0),
  // Reste aus dem Single-User-Format
  settings: PersistedSettingsSchema.optional().catch(undefined),
  sent_deals: z.array(z.string()).optional().catch(undefined),
});

const LegacyStateSchema = z.object({
  settings: PersistedSettingsSchema.catch({}),
  sent_deals: z.array(z.string()).catch([]),
  last_update_id: z.number().int().catch(0),
});

export interface PersistedState {
  users: Record<string, PersistedUser>;
  pending: Record<string, PendingRequest>;
  last_update_id: number;
}

export class StateDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StateDecodeError';
  }
}

export function emptyState(): AppState {
  return { users: new Map(), pending: new Map(), lastUpdateId: 0 };
}

export function toSettingsOverrides(persisted: PersistedSettings): SettingsOverrides {
  const overrides: SettingsOverrides = {};
  if (persisted.origin !== undefined) overrides.origin = persisted.origin;
  if (persisted.days_ahead !== undefined) overrides.daysAhead = persisted.days_ahead;
  if (persisted.base_price_eur !== undefined) overrides.basePrice = persisted.base_price_eur;
  if (persisted.base_duration_minutes !== undefined) overrides.baseDurationMinutes = persisted.base_duration_minutes;
  if (persisted.price_increment_eur !== undefined) overrides.priceIncrement = persisted.price_increment_eur;
  if (persisted.increment_minutes !== undefined) overrides.incrementMinutes = persisted.increment_minutes;
  if (persisted.currency !== undefined) overrides.currency = persisted.currency;
  if (persisted.market !== undefined) overrides.market = persisted.market;
  if (persisted.limit !== undefined) overrides.limit = persisted.limit;
  if (persisted.direct_only !== undefined) overrides.directOnly = persisted.direct_only;
  return overrides;
}

export function toPersistedSettings(overrides: SettingsOverrides): PersistedSettings {
  const persisted: PersistedSettings = {};
  if (overrides.origin !== undefined) persisted.origin = overrides.origin;
  if (overrides.daysAhead !== undefined) persisted.days_ahead = overrides.daysAhead;
  if (overrides.basePrice !== undefined) persisted.base_price_eur = overrides.basePrice;
  if (overrides.baseDurationMinutes !== undefined) persisted.base_duration_minutes = overrides.baseDurationMinutes;
  if (overrides.priceIncrement !== undefined) persisted.price_increment_eur = overrides.priceIncrement;
  if (overrides.incrementMinutes !== undefined) persisted.increment_minutes = overrides.incrementMinutes;
  if (overrides.currency !== undefined) persisted.currency = overrides.currency;
  if (overrides.market !== undefined) persisted.market = overrides.market;
  if (overrides.limit !== undefined) persisted.limit = overrides.limit;
  if (overrides.directOnly !== undefined) persisted.direct_only = overrides.directOnly;
  return persisted;
}

function toUserRecord(user: PersistedUser): UserRecord {
  return { name: user.name, settings: toSettingsOverrides(user.settings), sentDeals: [...user.sent_deals] };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Dekodiert ein gespeichertes Dokument.
 *
 * @param adminChatId - Ziel für Daten aus dem Single-User-Format ('' = verwerfen)
 * @throws StateDecodeError wenn das Dokument kein Objekt ist oder `users` unbrauchbar ist
 */
export function decodeState(raw: unknown, adminChatId: string): AppState {
  if (!isRecord(raw)) {
    throw new StateDecodeError('State ist kein JSON-Objekt');
  }

  if (!('users' in raw && 'pending' in raw)) {
    return migrateLegacyState(raw, adminChatId);
  }

  const parsed = PersistedStateSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StateDecodeError(`Ungültiges State-Format: ${parsed.error.issues[0]?.message ?? 'unbekannt'}`);
  }

  const doc = parsed.data;
  const state = emptyState();
  state.lastUpdateId = doc.last_update_id;

  for (const [chatId, user] of Object.entries(doc.users)) {
    state.users.set(chatId, toUserRecord(user));
  }
  for (const [chatId, request] of Object.entries(doc.pending)) {
    // Eine ID ist entweder freigeschaltet oder offen, nie beides
    if (!state.users.has(chatId)) {
      state.pending.set(chatId, { name: request.name, username: request.username });
    }
  }

  if (adminChatId && !state.users.has(adminChatId)) {
    state.users.set(adminChatId, {
      name: ADMIN_DEFAULT_NAME,
      settings: toSettingsOverrides(doc.settings ?? {}),
      sentDeals: [...(doc.sent_deals ?? [])],
    });
    state.pending.delete(adminChatId);
  }

  return state;
}

function migrateLegacyState(raw: Record<string, unknown>, adminChatId: string): AppState {
  const legacy = LegacyStateSchema.parse(raw);
  const state = emptyState();
  state.lastUpdateId = legacy.last_update_id;

  if (adminChatId) {
    state.users.set(adminChatId, {
      name: ADMIN_DEFAULT_NAME,
      settings: toSettingsOverrides(legacy.settings),
      sentDeals: [...legacy.sent_deals],
    });
  }

  console.log('[STATE] Altes Single-User-Format migriert');
  return state;
}

export function encodeState(state: AppState): PersistedState {
  const users: Record<string, PersistedUser> = {};
  for (const [chatId, user] of state.users) {
    users[chatId] = { name: user.name, settings: toPersistedSettings(user.settings), sent_deals: [...user.sentDeals] };
  }

  const pending: Record<string, PendingRequest> = {};
  for (const [chatId, request] of state.pending) {
    pending[chatId] = { name: request.name, username: request.username };
  }

  return { users, pending, last_update_id: state.lastUpdateId };
}
