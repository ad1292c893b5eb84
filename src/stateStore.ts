/**
 * State-Persistenz: lokale JSON-Datei und GitHub-Gist
 *
 * Laden: Gist zuerst, bei Fehler die lokale Datei, sonst leerer State.
 * Speichern: lokale Datei immer, Gist zusätzlich (nur mit Token).
 * Kein Fehler hier bricht einen Lauf ab.
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { errorMessage, requestJson } from './http';
import { decodeState, emptyState, encodeState } from './stateCodec';
import type { PersistedState } from './stateCodec';
import type { AppState } from './types';

export const GIST_STATE_FILENAME = 'state.json';
const GITHUB_API = 'https://api.github.com';

/**
 * Ein Speicherort für das rohe State-Dokument
 */
export interface StateStore {
  readonly name: string;
  /** null = kein State vorhanden */
  read(): Promise<unknown | null>;
  /** false = bewusst übersprungen */
  write(document: PersistedState): Promise<boolean>;
}

/**
 * Was der Orchestrator sieht: fertiger AppState rein und raus
 */
export interface StateRepository {
  load(): Promise<AppState>;
  save(state: AppState): Promise<void>;
}

export function serializeState(document: PersistedState): string {
  return JSON.stringify(document, null, 2);
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileStateStore implements StateStore {
  readonly name: string;
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
    this.name = `Datei ${filePath}`;
  }

  async read(): Promise<unknown | null> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf-8');
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }
    const document: unknown = JSON.parse(text);
    return document;
  }

  /**
   * Schreibt über eine Temp-Datei + rename, damit nie eine halbe Datei liegen bleibt
   */
  async write(document: PersistedState): Promise<boolean> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    await writeFile(tmpPath, serializeState(document), 'utf-8');
    await rename(tmpPath, this.filePath);
    return true;
  }
}

const GistResponseSchema = z.object({
  files: z.record(
    z.string(),
    z.object({
      content: z.string().optional(),
    })
  ),
});

export class GistStateStore implements StateStore {
  readonly name: string;
  private readonly gistId: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly apiBase: string;

  constructor(args: { gistId: string; token: string; timeoutMs: number; apiBase?: string }) {
    this.gistId = args.gistId;
    this.token = args.token;
    this.timeoutMs = args.timeoutMs;
    this.apiBase = (args.apiBase ?? GITHUB_API).replace(/\/+$/, '');
    this.name = `Gist ${args.gistId}`;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/vnd.github+json' };
    if (this.token) {
      headers.Authorization = `token ${this.token}`;
    }
    return headers;
  }

  async read(): Promise<unknown | null> {
    const body = await requestJson(`${this.apiBase}/gists/${this.gistId}`, {
      method: 'GET',
      headers: this.headers(),
      timeoutMs: this.timeoutMs,
    });

    const gist = GistResponseSchema.parse(body);
    const content = gist.files[GIST_STATE_FILENAME]?.content;
    if (content === undefined) {
      return null;
    }
    const document: unknown = JSON.parse(content);
    return document;
  }

  async write(document: PersistedState): Promise<boolean> {
    if (!this.token) {
      console.warn('[STATE][WARN] Kein GH_TOKEN gesetzt – Gist wird nicht aktualisiert');
      return false;
    }

    await requestJson(`${this.apiBase}/gists/${this.gistId}`, {
      method: 'PATCH',
      headers: { ...this.headers(), 'Content-Type': 'application/json' },
      body: JSON.stringify({ files: { [GIST_STATE_FILENAME]: { content: serializeState(document) } } }),
      timeoutMs: this.timeoutMs,
    });
    return true;
  }
}

/**
 * Kombiniert optionalen Remote-Store und lokale Datei
 */
export class LayeredStateRepository implements StateRepository {
  private readonly local: StateStore;
  private readonly remote: StateStore | null;
  private readonly adminChatId: string;

  constructor(args: { local: StateStore; remote: StateStore | null; adminChatId: string }) {
    this.local = args.local;
    this.remote = args.remote;
    this.adminChatId = args.adminChatId;
  }

  async load(): Promise<AppState> {
    const sources = this.remote ? [this.remote, this.local] : [this.local];

    for (const store of sources) {
      try {
        const document = await store.read();
        if (document === null) {
          continue;
        }
        const state = decodeState(document, this.adminChatId);
        console.log(`[STATE] State aus ${store.name} geladen (${state.users.size} Nutzer, ${state.pending.size} offen)`);
        return state;
      } catch (error: unknown) {
        console.warn(`[STATE][WARN] Laden aus ${store.name} fehlgeschlagen: ${errorMessage(error)}`);
      }
    }

    console.log('[STATE] Kein gespeicherter State – starte leer');
    return emptyState();
  }

  async save(state: AppState): Promise<void> {
    const document = encodeState(state);
    const targets = this.remote ? [this.local, this.remote] : [this.local];

    for (const store of targets) {
      try {
        if (await store.write(document)) {
          console.log(`[STATE] State in ${store.name} gespeichert`);
        }
      } catch (error: unknown) {
        console.error(`[STATE][ERROR] Speichern in ${store.name} fehlgeschlagen: ${errorMessage(error)}`);
      }
    }
  }
}
