import { describe, expect, it } from 'vitest';
import { LEDGER_CAPACITY, SentDealLedger, dealFingerprint } from '../src/dedup';
import { makeDeal } from './helpers';

describe('dealFingerprint', () => {
  it('is a 12 character hex digest', () => {
    expect(dealFingerprint(makeDeal())).toMatch(/^[0-9a-f]{12}$/);
  });

  it('depends only on route, departure and price', () => {
    const base = dealFingerprint(makeDeal());

    expect(dealFingerprint(makeDeal({ airline: 'FR', flightNumber: '1', link: '', threshold: 99 }))).toBe(base);
    expect(dealFingerprint(makeDeal({ origin: 'PRG' }))).not.toBe(base);
    expect(dealFingerprint(makeDeal({ destination: 'BER' }))).not.toBe(base);
    expect(dealFingerprint(makeDeal({ departureAt: '2026-10-21T06:15:00+02:00' }))).not.toBe(base);
    expect(dealFingerprint(makeDeal({ price: 19 }))).not.toBe(base);
  });
});

describe('SentDealLedger', () => {
  it('selects only deals not yet recorded', () => {
    const known = makeDeal({ destination: 'BER' });
    const ledger = new SentDealLedger([dealFingerprint(known)]);

    const fresh = ledger.selectNew([known, makeDeal()]);

    expect(fresh).toHaveLength(1);
    expect(fresh[0].deal.destination).toBe('VIE');
    expect(fresh[0].fingerprint).toBe(dealFingerprint(makeDeal()));
  });

  it('does not change on selectNew and yields nothing after recording', () => {
    const ledger = new SentDealLedger();
    const deals = [makeDeal(), makeDeal({ price: 15 })];

    expect(ledger.selectNew(deals)).toHaveLength(2);
    expect(ledger.selectNew(deals)).toHaveLength(2);
    expect(ledger.size).toBe(0);

    ledger.record(ledger.selectNew(deals).map((entry) => entry.fingerprint));
    expect(ledger.selectNew(deals)).toEqual([]);
  });

  it('reports duplicates within one batch once', () => {
    const ledger = new SentDealLedger();
    expect(ledger.selectNew([makeDeal(), makeDeal({ airline: 'FR' })])).toHaveLength(1);
  });

  it('keeps only the most recent entries, oldest evicted first', () => {
    const ledger = new SentDealLedger();
    const fingerprints = Array.from({ length: LEDGER_CAPACITY + 5 }, (_, i) => `fp${i}`);

    ledger.record(fingerprints);

    expect(ledger.size).toBe(500);
    expect(ledger.toArray()[0]).toBe('fp5');
    expect(ledger.toArray()[499]).toBe('fp504');
    expect(ledger.has('fp4')).toBe(false);
    expect(ledger.has('fp5')).toBe(true);
  });

  it('trims oversized history on construction', () => {
    const ledger = new SentDealLedger(['a', 'b', 'c', 'd'], 3);
    expect(ledger.toArray()).toEqual(['b', 'c', 'd']);
  });

  it('clear empties the ledger', () => {
    const ledger = new SentDealLedger(['a']);
    ledger.clear();
    expect(ledger.size).toBe(0);
    expect(ledger.has('a')).toBe(false);
  });
});
