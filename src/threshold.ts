/**
 * Schwellwert-Modell: maximal akzeptierter Preis in Abhängigkeit der Flugdauer
 */

import type { UserSettings } from './types';

export type ThresholdSettings = Pick<
  UserSettings,
  'basePrice' | 'baseDurationMinutes' | 'priceIncrement' | 'incrementMinutes'
>;

/**
 * Bis `baseDurationMinutes` gilt `basePrice`. Jeder angefangene Block von
 * `incrementMinutes` darüber hinaus erhöht das Limit um `priceIncrement`.
 */
export function maxPriceForDuration(durationMinutes: number, settings: ThresholdSettings): number {
  if (durationMinutes <= settings.baseDurationMinutes) {
    return settings.basePrice;
  }
  const extraSteps = Math.ceil((durationMinutes - settings.baseDurationMinutes) / settings.incrementMinutes);
  return settings.basePrice + extraSteps * settings.priceIncrement;
}
