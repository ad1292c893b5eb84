/**
 * Telegram-Transport
 *
 * Eingehend: getUpdates ab Cursor. Ausgehend: sendMessage mit festem Footer.
 * Fail-safe: Fehler werden geloggt und als SendResult bzw. leere Liste gemeldet.
 */

import { Telegram } from 'telegraf';
import type { Update } from 'telegraf/types';
import { errorMessage, withTimeout } from './http';
import type { InboundUpdate, Messenger, SendOptions, SendResult, UpdateSource } from './types';

export const TELEGRAM_MAX_MESSAGE_LENGTH = 4096;
const UPDATES_LIMIT = 100;

/**
 * Ausschnitt der Telegraf-API, den der Gateway benutzt
 */
export interface TelegramApi {
  sendMessage(
    chatId: string,
    text: string,
    extra: { parse_mode?: 'Markdown'; link_preview_options: { is_disabled: boolean } }
  ): Promise<{ message_id: number }>;
  getUpdates(timeout: number, limit: number, offset: number, allowedUpdates: undefined): Promise<Update[]>;
}

/**
 * Kürzt auf höchstens `maxUnits` UTF-16-Einheiten, ohne ein Surrogatpaar
 * (Emoji) zu zerteilen. Telegram lehnt Text mit halben Zeichen ab.
 */
export function cutAtCodePoint(text: string, maxUnits: number): string {
  if (text.length <= maxUnits) {
    return text;
  }
  const last = text.charCodeAt(maxUnits - 1);
  const end = last >= 0xd800 && last <= 0xdbff ? maxUnits - 1 : maxUnits;
  return text.slice(0, end);
}

/**
 * Escaped Sonderzeichen für Telegrams Legacy-Markdown
 */
export function escapeMarkdown(s: string): string {
  return s.replace(/([_*`[])/g, '\\$1');
}

/**
 * Mappt ein Telegram-Update auf das interne Modell. Updates ohne Text-Nachricht
 * behalten ihre ID, damit der Cursor weiterläuft.
 */
export function toInboundUpdate(update: Update): InboundUpdate {
  if (!('message' in update)) {
    return { updateId: update.update_id, message: null };
  }

  const message = update.message;
  if (!('text' in message)) {
    return { updateId: update.update_id, message: null };
  }

  return {
    updateId: update.update_id,
    message: {
      chatId: String(message.chat.id),
      text: message.text,
      firstName: message.from?.first_name ?? '',
      username: message.from?.username ?? '',
    },
  };
}

export class TelegramGateway implements Messenger, UpdateSource {
  private readonly api: TelegramApi | null;
  private readonly footer: string;
  private readonly timeoutMs: number;

  constructor(args: { api: TelegramApi | null; footer: string; timeoutMs: number }) {
    this.api = args.api;
    this.footer = args.footer;
    this.timeoutMs = args.timeoutMs;
  }

  /**
   * Hängt den Footer an und kappt auf das Telegram-Limit
   */
  withFooter(text: string, markdown: boolean): string {
    if (!this.footer) {
      return cutAtCodePoint(text, TELEGRAM_MAX_MESSAGE_LENGTH);
    }
    const footer = markdown ? `\n\n_${escapeMarkdown(this.footer)}_` : `\n\n${this.footer}`;
    return cutAtCodePoint(text + footer, TELEGRAM_MAX_MESSAGE_LENGTH);
  }

  async send(chatId: string, text: string, options: SendOptions = {}): Promise<SendResult> {
    if (!this.api || !chatId) {
      return { success: false, messageId: null, error: 'Telegram nicht konfiguriert' };
    }

    const markdown = options.markdown === true;
    try {
      // Nach einem Timeout läuft der Request weiter und kann noch zustellen
      const sent = await withTimeout(
        this.api.sendMessage(chatId, this.withFooter(text, markdown), {
          ...(markdown ? { parse_mode: 'Markdown' as const } : {}),
          link_preview_options: { is_disabled: true },
        }),
        this.timeoutMs,
        'sendMessage'
      );
      return { success: true, messageId: sent.message_id, error: null };
    } catch (err: unknown) {
      const message = errorMessage(err);
      console.error(`[TELEGRAM][ERROR] Senden an ${chatId} fehlgeschlagen: ${message}`);
      return { success: false, messageId: null, error: message };
    }
  }

  async fetchUpdates(afterUpdateId: number): Promise<InboundUpdate[]> {
    if (!this.api) {
      return [];
    }

    try {
      const updates = await withTimeout(
        this.api.getUpdates(0, UPDATES_LIMIT, afterUpdateId + 1, undefined),
        this.timeoutMs,
        'getUpdates'
      );
      return updates.map(toInboundUpdate);
    } catch (err: unknown) {
      console.error(`[TELEGRAM][ERROR] getUpdates fehlgeschlagen: ${errorMessage(err)}`);
      return [];
    }
  }
}

export function createTelegramGateway(args: { botToken: string; footer: string; timeoutMs: number }): TelegramGateway {
  const api = args.botToken ? new Telegram(args.botToken) : null;
  return new TelegramGateway({ api, footer: args.footer, timeoutMs: args.timeoutMs });
}
