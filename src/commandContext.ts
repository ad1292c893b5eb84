import type { AppState, InboundMessage, Messenger, SendResult } from './types';

/**
 * Alles, was ein Handler für genau eine eingehende Nachricht braucht
 */
export interface CommandContext {
  state: AppState;
  messenger: Messenger;
  adminChatId: string;
  message: InboundMessage;
}

export function reply(ctx: CommandContext, text: string, markdown: boolean = false): Promise<SendResult> {
  return ctx.messenger.send(ctx.message.chatId, text, { markdown });
}

export function isAdmin(ctx: CommandContext): boolean {
  return ctx.adminChatId !== '' && ctx.message.chatId === ctx.adminChatId;
}
