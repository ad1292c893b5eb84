import { describe, expect, it } from 'vitest';
import {
  MAX_REPORT_LENGTH,
  TRUNCATION_MARKER,
  buildDealReport,
  formatDeal,
  formatDeparture,
  formatDuration,
  formatStops,
} from '../src/reporter';
import { isWellFormedText, makeDeal } from './helpers';

describe('formatting helpers', () => {
  it('formats durations as hours and padded minutes', () => {
    expect(formatDuration(85)).toBe('1h25m');
    expect(formatDuration(600)).toBe('10h00m');
    expect(formatDuration(45)).toBe('0h45m');
  });

  it('keeps the local departure time', () => {
    expect(formatDeparture('2026-10-20T06:15:00+02:00')).toBe('2026-10-20 06:15');
    expect(formatDeparture('')).toBe('?');
  });

  it('names the number of stops', () => {
    expect(formatStops(0)).toBe('direkt');
    expect(formatStops(1)).toBe('1 Umstieg');
    expect(formatStops(2)).toBe('2 Umstiege');
  });
});

describe('formatDeal', () => {
  it('renders route, times, price and link', () => {
    expect(formatDeal(makeDeal())).toBe(
      [
        '✈️ BUD → VIE',
        '   2026-10-20 06:15 | 1h20m | direkt',
        '   💰 18 EUR (Limit 20 EUR)',
        '   W6 2301',
        'https://www.aviasales.com/search/BUD2010VIE1',
      ].join('\n')
    );
  });

  it('omits the link line when there is none', () => {
    expect(formatDeal(makeDeal({ link: '' })).endsWith('   W6 2301')).toBe(true);
  });
});

describe('buildDealReport', () => {
  it('uses the singular header for one deal', () => {
    expect(buildDealReport([makeDeal()])).toBe(`🔥 1 neuer günstiger Flug!\n\n${formatDeal(makeDeal())}`);
  });

  it('separates several deals by blank lines', () => {
    const first = makeDeal({ price: 12 });
    const second = makeDeal({ price: 15, destination: 'BER' });

    expect(buildDealReport([first, second])).toBe(
      `🔥 2 neue günstige Flüge!\n\n${formatDeal(first)}\n\n${formatDeal(second)}`
    );
  });

  it('truncates to the maximum length with a marker', () => {
    const deals = Array.from({ length: 100 }, (_, i) => makeDeal({ price: i }));
    const report = buildDealReport(deals);

    expect(report.length).toBeLessThanOrEqual(MAX_REPORT_LENGTH);
    expect(report.length).toBeGreaterThanOrEqual(MAX_REPORT_LENGTH - 1);
    expect(report.endsWith(TRUNCATION_MARKER)).toBe(true);
    expect(report.startsWith('🔥 100 neue günstige Flüge!')).toBe(true);
    expect(isWellFormedText(report)).toBe(true);
  });

  it('never cuts an emoji in half', () => {
    const deals = [makeDeal({ price: 12 }), makeDeal({ price: 15, destination: 'BER' })];
    const full = buildDealReport(deals, 100000);
    const lastMoneyBag = full.lastIndexOf('💰');
    // Schnitt genau zwischen den beiden Hälften des Emojis
    const maxLength = lastMoneyBag + 1 + TRUNCATION_MARKER.length;

    const report = buildDealReport(deals, maxLength);

    expect(report).toBe(full.slice(0, lastMoneyBag) + TRUNCATION_MARKER);
    expect(report).toHaveLength(maxLength - 1);
    expect(isWellFormedText(report)).toBe(true);
  });

  it('stays well-formed for long reports with wide carrier names', () => {
    const deals = Array.from({ length: 60 }, () => makeDeal({ airline: 'X'.repeat(18) }));
    const report = buildDealReport(deals);

    expect(report.length).toBeLessThanOrEqual(MAX_REPORT_LENGTH);
    expect(report.endsWith(TRUNCATION_MARKER)).toBe(true);
    expect(isWellFormedText(report)).toBe(true);
  });

  it('honours a custom maximum', () => {
    const report = buildDealReport([makeDeal(), makeDeal({ price: 1 })], 50);
    expect(report).toHaveLength(50);
    expect(report.endsWith('\n…')).toBe(true);
  });
});
