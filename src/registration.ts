/**
 * Registrierung: unbekannt → pending → (approved | verworfen)
 */

import { isAdmin, reply } from './commandContext';
import type { CommandContext } from './commandContext';
import { escapeMarkdown } from './telegram';
import { buildHelpText } from './userCommands';

export const REQUEST_SENT_TEXT = '📨 Anfrage gesendet! Bitte warte auf die Freigabe durch den Administrator.';
export const ALREADY_PENDING_TEXT = '⏳ Deine Anfrage wurde bereits gesendet. Bitte warte auf die Freigabe.';

/**
 * Admin-Benachrichtigung mit kopierfertigen Commands
 */
export function buildAdminRequestAlert(chatId: string, name: string, username: string): string {
  const handle = username ? ` (@${escapeMarkdown(username)})` : '';
  return [
    `🆕 Neue Anfrage von *${escapeMarkdown(name)}*${handle}`,
    `ID: \`${chatId}\``,
    '',
    `Freigeben: \`/approve ${chatId}\``,
    `Ablehnen: \`/reject ${chatId}\``,
  ].join('\n');
}

export async function handleStartCommand(ctx: CommandContext): Promise<void> {
  const { state, message } = ctx;
  const chatId = message.chatId;

  if (state.users.has(chatId)) {
    await reply(ctx, buildHelpText(isAdmin(ctx)), true);
    return;
  }

  if (state.pending.has(chatId)) {
    await reply(ctx, ALREADY_PENDING_TEXT);
    return;
  }

  const name = message.firstName || '?';
  state.pending.set(chatId, { name, username: message.username });
  console.log(`[COMMANDS] Neue Anfrage von ${name} (${chatId})`);

  await reply(ctx, REQUEST_SENT_TEXT);
  await ctx.messenger.send(ctx.adminChatId, buildAdminRequestAlert(chatId, name, message.username), {
    markdown: true,
  });
}
