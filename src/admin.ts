import { reply } from './commandContext';
import type { CommandContext } from './commandContext';
import { effectiveSettings, summarizeSettings } from './settings';
import { escapeMarkdown } from './telegram';

// ============================================================================
// Admin Command Handlers
// ============================================================================
// Der Admin-Check passiert im Router, Handler prüfen ihn nicht erneut.

export const APPROVED_USER_TEXT = '🎉 Du wurdest freigeschaltet! Sende /help für die Liste der Befehle.';
export const REJECTED_USER_TEXT = '❌ Deine Anfrage wurde vom Administrator abgelehnt.';

function notFoundText(targetId: string): string {
  return `❓ ID \`${targetId}\` nicht unter den offenen Anfragen.`;
}

/**
 * /approve <id> – verschiebt eine offene Anfrage in die User-Liste
 * (leere Settings, leerer Ledger)
 */
export async function handleApproveCommand(ctx: CommandContext, targetId: string): Promise<void> {
  const request = ctx.state.pending.get(targetId);
  if (!request) {
    await reply(ctx, notFoundText(targetId), true);
    return;
  }

  ctx.state.pending.delete(targetId);
  ctx.state.users.set(targetId, { name: request.name || '?', settings: {}, sentDeals: [] });
  console.log(`[COMMANDS] Nutzer ${request.name} (${targetId}) freigeschaltet`);

  await reply(ctx, `✅ Nutzer ${request.name || targetId} freigeschaltet.`);
  await ctx.messenger.send(targetId, APPROVED_USER_TEXT);
}

/**
 * /reject <id> – verwirft eine offene Anfrage spurlos
 */
export async function handleRejectCommand(ctx: CommandContext, targetId: string): Promise<void> {
  const request = ctx.state.pending.get(targetId);
  if (!request) {
    await reply(ctx, notFoundText(targetId), true);
    return;
  }

  ctx.state.pending.delete(targetId);
  console.log(`[COMMANDS] Anfrage von ${request.name} (${targetId}) abgelehnt`);

  await reply(ctx, `❌ Anfrage von ${request.name || targetId} abgelehnt.`);
  await ctx.messenger.send(targetId, REJECTED_USER_TEXT);
}

export function buildUsersOverview(ctx: CommandContext): string {
  const lines = ['👥 *Nutzer:*'];

  for (const [userId, user] of ctx.state.users) {
    const adminTag = userId === ctx.adminChatId ? ' 👑' : '';
    const summary = summarizeSettings(effectiveSettings(user.settings));
    lines.push(`• ${escapeMarkdown(user.name || '?')}${adminTag} – ${summary}`);
  }

  if (ctx.state.pending.size > 0) {
    lines.push('');
    lines.push(`⏳ *Offene Anfragen (${ctx.state.pending.size}):*`);
    for (const [pendingId, request] of ctx.state.pending) {
      lines.push(`• ${escapeMarkdown(request.name || '?')} – \`/approve ${pendingId}\``);
    }
  }

  return lines.join('\n');
}

/**
 * /users – alle freigeschalteten Nutzer plus offene Anfragen
 */
export async function handleUsersCommand(ctx: CommandContext): Promise<void> {
  await reply(ctx, buildUsersOverview(ctx), true);
}
