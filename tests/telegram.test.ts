import type { Update } from 'telegraf/types';
import { describe, expect, it } from 'vitest';
import {
  TELEGRAM_MAX_MESSAGE_LENGTH,
  TelegramGateway,
  cutAtCodePoint,
  escapeMarkdown,
  toInboundUpdate,
} from '../src/telegram';
import type { TelegramApi } from '../src/telegram';
import { isWellFormedText } from './helpers';

interface SendCall {
  chatId: string;
  text: string;
  extra: { parse_mode?: 'Markdown'; link_preview_options: { is_disabled: boolean } };
}

class FakeTelegramApi implements TelegramApi {
  readonly sendCalls: SendCall[] = [];
  readonly updateCalls: number[][] = [];
  failWith: Error | null = null;
  updates: Update[] = [];

  async sendMessage(chatId: string, text: string, extra: SendCall['extra']): Promise<{ message_id: number }> {
    if (this.failWith) throw this.failWith;
    this.sendCalls.push({ chatId, text, extra });
    return { message_id: this.sendCalls.length };
  }

  async getUpdates(timeout: number, limit: number, offset: number): Promise<Update[]> {
    if (this.failWith) throw this.failWith;
    this.updateCalls.push([timeout, limit, offset]);
    return this.updates;
  }
}

function textMessageUpdate(updateId: number, chatId: number, text: string): Update {
  return {
    update_id: updateId,
    message: {
      message_id: 1,
      date: 0,
      chat: { id: chatId, type: 'private', first_name: 'Anna' },
      from: { id: chatId, is_bot: false, first_name: 'Anna', username: 'anna_b' },
      text,
    },
  };
}

describe('escapeMarkdown', () => {
  it('escapes legacy markdown characters', () => {
    expect(escapeMarkdown('a_b*c`d[e')).toBe('a\\_b\\*c\\`d\\[e');
  });
});

describe('cutAtCodePoint', () => {
  it('keeps short text unchanged', () => {
    expect(cutAtCodePoint('ab💰', 4)).toBe('ab💰');
  });

  it('backs off instead of splitting a surrogate pair', () => {
    expect(cutAtCodePoint('ab💰cd', 3)).toBe('ab');
    expect(cutAtCodePoint('ab💰cd', 4)).toBe('ab💰');
  });
});

describe('toInboundUpdate', () => {
  it('maps text messages', () => {
    expect(toInboundUpdate(textMessageUpdate(10, 555, '/start'))).toEqual({
      updateId: 10,
      message: { chatId: '555', text: '/start', firstName: 'Anna', username: 'anna_b' },
    });
  });
});

describe('TelegramGateway', () => {
  it('appends the footer in italics for markdown messages', async () => {
    const api = new FakeTelegramApi();
    const gateway = new TelegramGateway({ api, footer: 'deal_bot', timeoutMs: 1000 });

    const result = await gateway.send('555', '*Hallo*', { markdown: true });

    expect(result).toEqual({ success: true, messageId: 1, error: null });
    expect(api.sendCalls).toEqual([
      {
        chatId: '555',
        text: '*Hallo*\n\n_deal\\_bot_',
        extra: { parse_mode: 'Markdown', link_preview_options: { is_disabled: true } },
      },
    ]);
  });

  it('appends the plain footer without a parse mode', async () => {
    const api = new FakeTelegramApi();
    await new TelegramGateway({ api, footer: 'deal_bot', timeoutMs: 1000 }).send('555', 'Hallo');

    expect(api.sendCalls[0].text).toBe('Hallo\n\ndeal_bot');
    expect(api.sendCalls[0].extra).toEqual({ link_preview_options: { is_disabled: true } });
  });

  it('caps messages at the Telegram limit', () => {
    const gateway = new TelegramGateway({ api: null, footer: 'deal_bot', timeoutMs: 1000 });
    expect(gateway.withFooter('a'.repeat(5000), false)).toHaveLength(TELEGRAM_MAX_MESSAGE_LENGTH);
  });

  it('does not split an emoji at the Telegram limit', () => {
    const text = 'a'.repeat(TELEGRAM_MAX_MESSAGE_LENGTH - 1) + '💰 mehr';

    const plain = new TelegramGateway({ api: null, footer: '', timeoutMs: 1000 }).withFooter(text, false);
    const footed = new TelegramGateway({ api: null, footer: 'deal_bot', timeoutMs: 1000 }).withFooter(text, true);

    expect(plain).toBe('a'.repeat(TELEGRAM_MAX_MESSAGE_LENGTH - 1));
    expect(footed).toBe('a'.repeat(TELEGRAM_MAX_MESSAGE_LENGTH - 1));
    expect(isWellFormedText(footed)).toBe(true);
  });

  it('reports failures instead of throwing', async () => {
    const api = new FakeTelegramApi();
    api.failWith = new Error('403: Forbidden: bot was blocked by the user');

    const result = await new TelegramGateway({ api, footer: '', timeoutMs: 1000 }).send('555', 'Hallo');

    expect(result).toEqual({
      success: false,
      messageId: null,
      error: '403: Forbidden: bot was blocked by the user',
    });
  });

  it('reports a send that outlasts the timeout as failed', async () => {
    const api = new FakeTelegramApi();
    api.sendMessage = () => new Promise<{ message_id: number }>(() => undefined);

    const result = await new TelegramGateway({ api, footer: '', timeoutMs: 20 }).send('555', 'Hallo');

    expect(result).toEqual({ success: false, messageId: null, error: 'sendMessage: Timeout nach 20ms' });
  });

  it('does nothing without a bot token or recipient', async () => {
    const api = new FakeTelegramApi();

    expect((await new TelegramGateway({ api: null, footer: '', timeoutMs: 1000 }).send('555', 'x')).success).toBe(false);
    expect((await new TelegramGateway({ api, footer: '', timeoutMs: 1000 }).send('', 'x')).success).toBe(false);
    expect(api.sendCalls).toEqual([]);
  });

  it('polls updates after the cursor', async () => {
    const api = new FakeTelegramApi();
    api.updates = [textMessageUpdate(8, 555, '/help')];

    const updates = await new TelegramGateway({ api, footer: '', timeoutMs: 1000 }).fetchUpdates(7);

    expect(api.updateCalls).toEqual([[0, 100, 8]]);
    expect(updates.map((update) => update.updateId)).toEqual([8]);
  });

  it('returns no updates when polling fails', async () => {
    const api = new FakeTelegramApi();
    api.failWith = new Error('ETIMEDOUT');

    expect(await new TelegramGateway({ api, footer: '', timeoutMs: 1000 }).fetchUpdates(0)).toEqual([]);
  });
});
