/**
 * Per-User Einstellungen: Defaults und Merge
 */

import type { SettingsOverrides, UserSettings } from './types';

// Ein Preis-Request pro Tag und Lauf
export const MAX_DAYS_AHEAD = 30;

export const DEFAULT_USER_SETTINGS: Readonly<UserSettings> = {
  origin: 'BUD',
  daysAhead: 3,
  basePrice: 20,
  baseDurationMinutes: 90,
  priceIncrement: 10,
  incrementMinutes: 30,
  currency: 'eur',
  market: 'hu',
  limit: 100,
  directOnly: false,
};

/**
 * Effektive Einstellungen: Defaults, überlagert mit explizit gesetzten Feldern
 */
export function effectiveSettings(overrides: SettingsOverrides): UserSettings {
  return { ...DEFAULT_USER_SETTINGS, ...overrides };
}

/**
 * Einzeilige Zusammenfassung für /users
 */
export function summarizeSettings(settings: UserSettings): string {
  return `\`${settings.origin}\`, ${settings.daysAhead}d, ${settings.basePrice}${currencySymbol(settings.currency)}`;
}

export function currencySymbol(currency: string): string {
  switch (currency.toLowerCase()) {
    case 'eur':
      return '€';
    case 'usd':
      return '$';
    case 'gbp':
      return '£';
    default:
      return ` ${currency.toUpperCase()}`;
  }
}
