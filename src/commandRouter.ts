/**
 * Zentraler Command-Router
 *
 * Verarbeitet die Telegram-Queue in Update-Reihenfolge und leitet jeden
 * Command nach Zugriffsprüfung an seinen Handler weiter.
 */

import { handleApproveCommand, handleRejectCommand, handleUsersCommand } from './admin';
import { isAdmin, reply } from './commandContext';
import type { CommandContext } from './commandContext';
import { isAdminCommand, parseCommand } from './commands';
import type { ParsedCommand } from './commands';
import { handleStartCommand } from './registration';
import type { AppState, InboundUpdate, Messenger } from './types';
import {
  handleDirectCommand,
  handleHelpCommand,
  handleInvalidValue,
  handleResetCommand,
  handleSetCommand,
  handleSettingsCommand,
  handleUsage,
} from './userCommands';

export const ACCESS_DENIED_TEXT = '⛔ Du bist nicht freigeschaltet. Sende /start, um Zugang anzufragen.';
export const ADMIN_ONLY_TEXT = '❌ Du bist kein Administrator.';
export const UNKNOWN_COMMAND_TEXT = '❓ Unbekannter Befehl. /help';

/**
 * Führt einen geparsten Command aus (mit Zugriffs- und Admin-Check)
 */
export async function executeCommand(ctx: CommandContext, parsed: ParsedCommand): Promise<void> {
  // /start ist der einzige Command für unbekannte Absender
  if (parsed.kind === 'start') {
    await handleStartCommand(ctx);
    return;
  }

  if (!ctx.state.users.has(ctx.message.chatId)) {
    await reply(ctx, ACCESS_DENIED_TEXT);
    return;
  }

  if (isAdminCommand(parsed) && !isAdmin(ctx)) {
    await reply(ctx, ADMIN_ONLY_TEXT);
    return;
  }

  switch (parsed.kind) {
    case 'help':
      await handleHelpCommand(ctx);
      return;
    case 'settings':
      await handleSettingsCommand(ctx);
      return;
    case 'direct':
      await handleDirectCommand(ctx);
      return;
    case 'reset':
      await handleResetCommand(ctx);
      return;
    case 'set':
      await handleSetCommand(ctx, parsed.update);
      return;
    case 'usage':
      await handleUsage(ctx, parsed.command);
      return;
    case 'invalidValue':
      await handleInvalidValue(ctx, parsed.raw);
      return;
    case 'approve':
      await handleApproveCommand(ctx, parsed.targetId);
      return;
    case 'reject':
      await handleRejectCommand(ctx, parsed.targetId);
      return;
    case 'users':
      await handleUsersCommand(ctx);
      return;
    case 'unrecognized':
      await reply(ctx, UNKNOWN_COMMAND_TEXT);
      return;
  }
}

/**
 * Wendet alle Updates in aufsteigender Reihenfolge auf den State an.
 *
 * Der Cursor wird vor der Verarbeitung eines Updates gesetzt: ein Update gilt
 * als erledigt, sobald es gelesen wurde, auch wenn Antworten fehlschlagen.
 *
 * @returns Anzahl der verarbeiteten Updates
 */
export async function processUpdates(
  state: AppState,
  updates: readonly InboundUpdate[],
  deps: { messenger: Messenger; adminChatId: string }
): Promise<number> {
  const ordered = [...updates]
    .filter((update) => update.updateId > state.lastUpdateId)
    .sort((a, b) => a.updateId - b.updateId);

  for (const update of ordered) {
    state.lastUpdateId = update.updateId;

    const message = update.message;
    if (!message || !message.chatId) {
      continue;
    }

    const parsed = parseCommand(message.text);
    if (!parsed) {
      continue;
    }

    const ctx: CommandContext = { state, messenger: deps.messenger, adminChatId: deps.adminChatId, message };
    try {
      await executeCommand(ctx, parsed);
    } catch (error: unknown) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.error(`[COMMANDS][ERROR] Fehler bei Update ${update.updateId} (${parsed.kind}): ${errorMessage}`);
    }
  }

  if (ordered.length > 0) {
    console.log(`[COMMANDS] ${ordered.length} Update(s) verarbeitet, Cursor bei ${state.lastUpdateId}`);
  }

  return ordered.length;
}
