/**
 * Command-Parser
 *
 * Übersetzt Nachrichtentext in eine geschlossene Menge von Command-Varianten.
 * Argumente werden hier validiert, Handler erhalten nur typisierte Werte.
 */

import { MAX_DAYS_AHEAD } from './settings';
import type { UserSettings } from './types';

export type NumericSettingKey = 'daysAhead' | 'basePrice' | 'baseDurationMinutes' | 'priceIncrement';

export type SettingUpdate =
  | { key: 'origin'; value: string }
  | { key: NumericSettingKey; value: number };

/**
 * Commands mit Pflicht-Argument
 */
export type ArgumentCommand = '/origin' | '/days' | '/price' | '/duration' | '/increment' | '/approve' | '/reject';

export type ParsedCommand =
  | { kind: 'start' }
  | { kind: 'help' }
  | { kind: 'settings' }
  | { kind: 'direct' }
  | { kind: 'reset' }
  | { kind: 'users' }
  | { kind: 'set'; command: ArgumentCommand; update: SettingUpdate }
  | { kind: 'approve'; targetId: string }
  | { kind: 'reject'; targetId: string }
  | { kind: 'usage'; command: ArgumentCommand }
  | { kind: 'invalidValue'; command: ArgumentCommand; raw: string }
  | { kind: 'unrecognized'; command: string };

interface NumericCommandRule {
  key: NumericSettingKey;
  min: number;
  max: number;
}

const NUMERIC_COMMANDS: Readonly<Record<string, NumericCommandRule>> = {
  '/days': { key: 'daysAhead', min: 1, max: MAX_DAYS_AHEAD },
  '/price': { key: 'basePrice', min: 0, max: Number.MAX_SAFE_INTEGER },
  '/duration': { key: 'baseDurationMinutes', min: 0, max: Number.MAX_SAFE_INTEGER },
  '/increment': { key: 'priceIncrement', min: 0, max: Number.MAX_SAFE_INTEGER },
};

const ADMIN_COMMANDS: ReadonlySet<string> = new Set(['/approve', '/reject', '/users']);

const IATA_PATTERN = /^[a-z]{3}$/i;
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Zerlegt einen Text in Command-Token und Argument.
 * Gibt null zurück, wenn der Text kein Command ist.
 */
export function splitCommand(text: string): { command: string; arg: string } | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith('/')) {
    return null;
  }

  const match = trimmed.match(/^(\S+)(?:\s+([\s\S]*))?$/);
  if (!match) {
    return null;
  }

  // "/days@MeinBot 5" → "/days"
  const command = match[1].toLowerCase().split('@')[0];
  const arg = (match[2] ?? '').trim();
  return { command, arg };
}

export function parseCommand(text: string): ParsedCommand | null {
  const parts = splitCommand(text);
  if (!parts) {
    return null;
  }
  const { command, arg } = parts;

  switch (command) {
    case '/start':
      return { kind: 'start' };
    case '/help':
      return { kind: 'help' };
    case '/settings':
      return { kind: 'settings' };
    case '/direct':
      return { kind: 'direct' };
    case '/reset':
      return { kind: 'reset' };
    case '/users':
      return { kind: 'users' };
    case '/approve':
    case '/reject': {
      if (!arg) {
        return { kind: 'usage', command };
      }
      const targetId = arg.split(/\s+/)[0];
      return command === '/approve' ? { kind: 'approve', targetId } : { kind: 'reject', targetId };
    }
    case '/origin': {
      if (!arg) {
        return { kind: 'usage', command };
      }
      if (!IATA_PATTERN.test(arg)) {
        return { kind: 'invalidValue', command, raw: arg };
      }
      return { kind: 'set', command, update: { key: 'origin', value: arg.toUpperCase() } };
    }
    case '/days':
    case '/price':
    case '/duration':
    case '/increment': {
      if (!arg) {
        return { kind: 'usage', command };
      }
      const rule = NUMERIC_COMMANDS[command];
      const value = parseIntegerArgument(arg, rule);
      if (value === null) {
        return { kind: 'invalidValue', command, raw: arg };
      }
      return { kind: 'set', command, update: { key: rule.key, value } };
    }
    default:
      return { kind: 'unrecognized', command };
  }
}

function parseIntegerArgument(arg: string, rule: NumericCommandRule): number | null {
  if (!INTEGER_PATTERN.test(arg)) {
    return null;
  }
  const value = parseInt(arg, 10);
  if (!Number.isSafeInteger(value) || value < rule.min || value > rule.max) {
    return null;
  }
  return value;
}

/**
 * Admin-Commands inklusive ihrer Fehlervarianten (fehlendes Argument)
 */
export function isAdminCommand(parsed: ParsedCommand): boolean {
  switch (parsed.kind) {
    case 'approve':
    case 'reject':
    case 'users':
      return true;
    case 'usage':
    case 'invalidValue':
      return ADMIN_COMMANDS.has(parsed.command);
    default:
      return false;
  }
}

/**
 * Wendet ein Setting-Update auf die Overrides eines Users an
 */
export function applySettingUpdate(settings: Partial<UserSettings>, update: SettingUpdate): void {
  switch (update.key) {
    case 'origin':
      settings.origin = update.value;
      break;
    default:
      settings[update.key] = update.value;
  }
}
