import { decodeState, emptyState, encodeState } from '../src/stateCodec';
import type { PersistedState } from '../src/stateCodec';
import type { StateRepository } from '../src/stateStore';
import type {
  AppState,
  Deal,
  InboundUpdate,
  Messenger,
  PriceSource,
  SendOptions,
  SendResult,
  Ticket,
  TicketQuery,
  UpdateSource,
} from '../src/types';

export interface SentMessage {
  chatId: string;
  text: string;
  markdown: boolean;
}

export class FakeMessenger implements Messenger {
  readonly sent: SentMessage[] = [];
  readonly failFor = new Set<string>();
  readonly throwFor = new Set<string>();

  async send(chatId: string, text: string, options: SendOptions = {}): Promise<SendResult> {
    if (this.throwFor.has(chatId)) {
      throw new Error(`send to ${chatId} exploded`);
    }
    this.sent.push({ chatId, text, markdown: options.markdown === true });
    if (this.failFor.has(chatId)) {
      return { success: false, messageId: null, error: 'chat not found' };
    }
    return { success: true, messageId: this.sent.length, error: null };
  }

  textsTo(chatId: string): string[] {
    return this.sent.filter((message) => message.chatId === chatId).map((message) => message.text);
  }
}

export class FakeUpdateSource implements UpdateSource {
  readonly calls: number[] = [];

  constructor(private readonly updates: InboundUpdate[]) {}

  async fetchUpdates(afterUpdateId: number): Promise<InboundUpdate[]> {
    this.calls.push(afterUpdateId);
    return this.updates.filter((update) => update.updateId > afterUpdateId);
  }
}

export class FakePriceSource implements PriceSource {
  readonly queries: TicketQuery[] = [];

  constructor(private readonly respond: (query: TicketQuery) => Ticket[]) {}

  async fetchTickets(query: TicketQuery): Promise<Ticket[]> {
    this.queries.push(query);
    return this.respond(query);
  }
}

/**
 * Speichert wie der echte Store nur das kodierte Dokument
 */
export class InMemoryRepository implements StateRepository {
  saves = 0;

  constructor(
    private readonly adminChatId: string,
    public document: PersistedState | null = null
  ) {}

  async load(): Promise<AppState> {
    return this.document ? decodeState(this.document, this.adminChatId) : emptyState();
  }

  async save(state: AppState): Promise<void> {
    this.saves++;
    this.document = encodeState(state);
  }
}

export function textUpdate(
  updateId: number,
  chatId: string,
  text: string,
  firstName: string = 'Anna',
  username: string = ''
): InboundUpdate {
  return { updateId, message: { chatId, text, firstName, username } };
}

export function makeDeal(overrides: Partial<Deal> = {}): Deal {
  return {
    origin: 'BUD',
    destination: 'VIE',
    departureAt: '2026-10-20T06:15:00+02:00',
    price: 18,
    currency: 'EUR',
    durationMinutes: 80,
    threshold: 20,
    airline: 'W6',
    flightNumber: '2301',
    transfers: 0,
    link: '/search/BUD2010VIE1',
    ...overrides,
  };
}

export function makeTicket(overrides: Partial<Ticket> = {}): Ticket {
  return {
    origin: 'BUD',
    destination: 'VIE',
    departureAt: '2026-10-18T06:15:00+02:00',
    price: 18,
    durationMinutes: 80,
    airline: 'W6',
    flightNumber: '2301',
    transfers: 0,
    link: '/search/BUD1810VIE1',
    ...overrides,
  };
}

/**
 * true, wenn kein einzelnes Surrogat im Text steht (gültig als UTF-8 kodierbar)
 */
export function isWellFormedText(text: string): boolean {
  for (let i = 0; i < text.length; i++) {
    const unit = text.charCodeAt(i);
    if (unit >= 0xd800 && unit <= 0xdbff) {
      const next = text.charCodeAt(i + 1);
      if (!(next >= 0xdc00 && next <= 0xdfff)) return false;
      i++;
    } else if (unit >= 0xdc00 && unit <= 0xdfff) {
      return false;
    }
  }
  return true;
}
