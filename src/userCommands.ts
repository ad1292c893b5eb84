/**
 * Commands für freigeschaltete Nutzer: Hilfe, Einstellungen, Verlauf
 */

import { isAdmin, reply } from './commandContext';
import type { CommandContext } from './commandContext';
import { applySettingUpdate } from './commands';
import type { ArgumentCommand, SettingUpdate } from './commands';
import { DEFAULT_USER_SETTINGS, currencySymbol, effectiveSettings } from './settings';
import type { UserRecord, UserSettings } from './types';

export const HELP_TEXT = `🤖 *Befehle:*

/origin XXX – Abflughafen (IATA)
/days N – Tage im Voraus (1–30)
/price N – Basispreis
/duration N – max. Flugdauer für den Basispreis (Min.)
/increment N – Aufschlag je angefangene 30 Min.
/direct – nur Direktflüge an/aus
/settings – aktuelle Einstellungen
/reset – Verlauf gesendeter Deals löschen
/help – diese Hilfe`;

export const ADMIN_HELP_TEXT = `

👑 *Admin-Befehle:*
/approve ID – Anfrage freigeben
/reject ID – Anfrage ablehnen
/users – Nutzerliste`;

export const RESET_TEXT = '🗑 Verlauf gelöscht.';

const SETTING_LABELS: Readonly<Record<SettingUpdate['key'], string>> = {
  origin: 'Abflughafen',
  daysAhead: 'Tage im Voraus',
  basePrice: 'Basispreis',
  baseDurationMinutes: 'Basisdauer (Min.)',
  priceIncrement: 'Aufschlag',
};

const USAGE_PLACEHOLDERS: Readonly<Record<ArgumentCommand, string>> = {
  '/origin': '<IATA>',
  '/days': '<Zahl>',
  '/price': '<Zahl>',
  '/duration': '<Zahl>',
  '/increment': '<Zahl>',
  '/approve': '<chat_id>',
  '/reject': '<chat_id>',
};

export function buildHelpText(forAdmin: boolean): string {
  return forAdmin ? HELP_TEXT + ADMIN_HELP_TEXT : HELP_TEXT;
}

/**
 * Der Router garantiert, dass der Absender freigeschaltet ist
 */
function requireUser(ctx: CommandContext): UserRecord {
  const user = ctx.state.users.get(ctx.message.chatId);
  if (!user) {
    throw new Error(`Nutzer ${ctx.message.chatId} nicht freigeschaltet`);
  }
  return user;
}

export function buildSettingsText(settings: UserSettings, sentCount: number): string {
  const symbol = currencySymbol(settings.currency);
  return [
    `🏙 Abflughafen: \`${settings.origin}\``,
    `📅 Tage im Voraus: \`${settings.daysAhead}\``,
    `💰 Basispreis: \`${settings.basePrice}${symbol}\``,
    `⏱ Basisdauer: \`${settings.baseDurationMinutes} Min.\``,
    `📈 Aufschlag: \`+${settings.priceIncrement}${symbol} / ${settings.incrementMinutes} Min.\``,
    `✈️ Nur Direktflüge: \`${settings.directOnly ? 'ja' : 'nein'}\``,
    `📊 Gesendet: \`${sentCount}\``,
  ].join('\n');
}

export async function handleHelpCommand(ctx: CommandContext): Promise<void> {
  await reply(ctx, buildHelpText(isAdmin(ctx)), true);
}

export async function handleSettingsCommand(ctx: CommandContext): Promise<void> {
  const user = requireUser(ctx);
  await reply(ctx, buildSettingsText(effectiveSettings(user.settings), user.sentDeals.length), true);
}

export async function handleSetCommand(ctx: CommandContext, update: SettingUpdate): Promise<void> {
  const user = requireUser(ctx);
  applySettingUpdate(user.settings, update);
  await reply(ctx, `✅ ${SETTING_LABELS[update.key]} = \`${update.value}\``, true);
}

/**
 * /direct – schaltet den effektiven Wert um (Default, falls nie gesetzt)
 */
export async function handleDirectCommand(ctx: CommandContext): Promise<void> {
  const user = requireUser(ctx);
  const current = user.settings.directOnly ?? DEFAULT_USER_SETTINGS.directOnly;
  user.settings.directOnly = !current;
  await reply(ctx, user.settings.directOnly ? '✅ Nur Direktflüge' : '❌ Alle Flüge');
}

export async function handleResetCommand(ctx: CommandContext): Promise<void> {
  const user = requireUser(ctx);
  user.sentDeals = [];
  await reply(ctx, RESET_TEXT);
}

export async function handleUsage(ctx: CommandContext, command: ArgumentCommand): Promise<void> {
  await reply(ctx, `⚠️ \`${command} ${USAGE_PLACEHOLDERS[command]}\``, true);
}

export async function handleInvalidValue(ctx: CommandContext, raw: string): Promise<void> {
  await reply(ctx, `⚠️ Ungültiger Wert: ${raw}`);
}
