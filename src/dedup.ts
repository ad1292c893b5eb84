/**
 * Deal-Deduplizierung mit Fingerprint-basiertem Ledger pro User
 *
 * Fingerprint: md5(`${origin}-${destination}-${departureAt}-${price}`), 12 Hex-Zeichen
 * Kapazität: 500 Einträge, älteste fliegen zuerst raus (FIFO)
 */

import { createHash } from 'crypto';
import type { Deal } from './types';

export const LEDGER_CAPACITY = 500;

export type FingerprintFields = Pick<Deal, 'origin' | 'destination' | 'departureAt' | 'price'>;

export interface FingerprintedDeal {
  fingerprint: string;
  deal: Deal;
}

/**
 * Erstellt den Fingerprint eines Deals. Stabil über Prozess-Neustarts hinweg,
 * alle anderen Felder (Airline, Link, …) spielen keine Rolle.
 */
export function dealFingerprint(deal: FingerprintFields): string {
  const key = `${deal.origin}-${deal.destination}-${deal.departureAt}-${deal.price}`;
  return createHash('md5').update(key).digest('hex').slice(0, 12);
}

export class SentDealLedger {
  private entries: string[];
  private index: Set<string>;
  private readonly capacity: number;

  constructor(entries: readonly string[] = [], capacity: number = LEDGER_CAPACITY) {
    this.capacity = capacity;
    this.entries = entries.slice(-capacity);
    this.index = new Set(this.entries);
  }

  has(fingerprint: string): boolean {
    return this.index.has(fingerprint);
  }

  /**
   * Liefert nur Deals, deren Fingerprint noch nicht im Ledger steht.
   * Doppelte Fingerprints innerhalb desselben Batches werden einmal geliefert.
   * Verändert den Ledger nicht.
   */
  selectNew(deals: readonly Deal[]): FingerprintedDeal[] {
    const batch = new Set<string>();
    const fresh: FingerprintedDeal[] = [];

    for (const deal of deals) {
      const fingerprint = dealFingerprint(deal);
      if (this.index.has(fingerprint) || batch.has(fingerprint)) {
        continue;
      }
      batch.add(fingerprint);
      fresh.push({ fingerprint, deal });
    }

    return fresh;
  }

  /**
   * Hängt gesendete Fingerprints an und kürzt auf die neuesten `capacity` Einträge.
   * Ein verdrängter Fingerprint gilt danach wieder als neu.
   */
  record(fingerprints: readonly string[]): void {
    this.entries = [...this.entries, ...fingerprints].slice(-this.capacity);
    this.index = new Set(this.entries);
  }

  clear(): void {
    this.entries = [];
    this.index.clear();
  }

  get size(): number {
    return this.entries.length;
  }

  toArray(): string[] {
    return [...this.entries];
  }
}
