import dotenv from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import * as cron from 'node-cron';
import { z } from 'zod';

dotenv.config();

export interface Config {
  aviasalesToken: string;
  telegramBotToken: string;
  adminChatId: string;
  gistId: string;
  githubToken: string;
  stateFile: string;
  // Scheduler-Modus (--schedule)
  runSchedule: string;
  // Timeouts (ms), keine Retries
  priceTimeoutMs: number;
  telegramTimeoutMs: number;
  gistTimeoutMs: number;
  messageFooter: string;
}

export const DEFAULT_CONFIG_FILE = 'config.json';
export const DEFAULT_STATE_FILE = 'state.json';
export const DEFAULT_RUN_SCHEDULE = '0 */2 * * *';
export const DEFAULT_MESSAGE_FOOTER = 'Flight Deal Bot';

/**
 * Schlüssel wie im config.json der bisherigen Skript-Generationen
 */
const ConfigFileSchema = z.object({
  aviasales_token: z.string().optional(),
  telegram_bot_token: z.string().optional(),
  admin_chat_id: z.union([z.string(), z.number()]).optional(),
  // Alt: Single-User-Chat ist der Admin
  telegram_chat_id: z.union([z.string(), z.number()]).optional(),
  gist_id: z.string().optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Maskiert einen Token für sicheres Logging (zeigt nur ersten und letzten Teil)
 */
export function maskToken(token: string): string {
  if (!token) {
    return '(nicht gesetzt)';
  }
  if (token.length < 10) {
    return '***';
  }
  if (token.length <= 12) {
    return `${token.substring(0, 4)}...`;
  }
  return `${token.substring(0, 6)}...${token.substring(token.length - 4)}`;
}

/**
 * Parst eine positive Zahl aus ENV mit Default und Validierung
 */
export function parsePositiveInt(envValue: string | undefined, defaultValue: number, name: string): number {
  if (envValue === undefined || envValue === '') {
    return defaultValue;
  }
  const parsed = parseInt(envValue, 10);
  if (isNaN(parsed) || parsed <= 0) {
    console.warn(`⚠️  [Config] ${name} ungültig ('${envValue}'), verwende Default: ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

/**
 * Liest die optionale JSON-Konfigurationsdatei. Fehlt sie oder ist sie
 * ungültig, gelten nur ENV und Defaults.
 */
export function readConfigFile(filePath: string): ConfigFile {
  if (!existsSync(filePath)) {
    return {};
  }

  try {
    const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn(`⚠️  [Config] ${filePath} hat ein ungültiges Format und wird ignoriert`);
      return {};
    }
    return parsed.data;
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.warn(`⚠️  [Config] ${filePath} konnte nicht gelesen werden: ${errorMessage}`);
    return {};
  }
}

function envValue(env: NodeJS.ProcessEnv, name: string): string {
  return env[name]?.trim() || '';
}

function fileValue(value: string | number | undefined): string {
  return value === undefined ? '' : String(value).trim();
}

/**
 * Reihenfolge: Defaults < config.json < Environment
 */
export function buildConfig(file: ConfigFile, env: NodeJS.ProcessEnv): Config {
  const adminFromFile = fileValue(file.admin_chat_id) || fileValue(file.telegram_chat_id);

  return {
    aviasalesToken: envValue(env, 'AVIASALES_TOKEN') || fileValue(file.aviasales_token),
    telegramBotToken: envValue(env, 'TELEGRAM_BOT_TOKEN') || fileValue(file.telegram_bot_token),
    adminChatId: envValue(env, 'TELEGRAM_CHAT_ID') || adminFromFile,
    gistId: envValue(env, 'GIST_ID') || fileValue(file.gist_id),
    githubToken: envValue(env, 'GH_TOKEN'),
    stateFile: envValue(env, 'STATE_FILE') || DEFAULT_STATE_FILE,
    runSchedule: envValue(env, 'RUN_SCHEDULE') || DEFAULT_RUN_SCHEDULE,
    priceTimeoutMs: parsePositiveInt(env.PRICE_TIMEOUT_MS, 30000, 'PRICE_TIMEOUT_MS'),
    telegramTimeoutMs: parsePositiveInt(env.TELEGRAM_TIMEOUT_MS, 15000, 'TELEGRAM_TIMEOUT_MS'),
    gistTimeoutMs: parsePositiveInt(env.GIST_TIMEOUT_MS, 10000, 'GIST_TIMEOUT_MS'),
    messageFooter: env.MESSAGE_FOOTER ?? DEFAULT_MESSAGE_FOOTER,
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const configFile = path.resolve(envValue(env, 'CONFIG_FILE') || DEFAULT_CONFIG_FILE);
  return buildConfig(readConfigFile(configFile), env);
}

export interface ConfigProblems {
  errors: string[];
  warnings: string[];
}

export function collectConfigProblems(config: Config): ConfigProblems {
  const errors: string[] = [];
  const warnings: string[] = [];

  // KRITISCH: ohne Preisquelle kein Lauf
  if (!config.aviasalesToken) {
    errors.push('AVIASALES_TOKEN fehlt (ENV oder aviasales_token in config.json)');
  }

  // NICHT-KRITISCH: Lauf ohne Commands/Benachrichtigungen möglich
  if (!config.telegramBotToken) {
    warnings.push('TELEGRAM_BOT_TOKEN fehlt – Commands und Benachrichtigungen werden übersprungen');
  }

  if (!config.adminChatId) {
    warnings.push('TELEGRAM_CHAT_ID (Admin) fehlt – Anfragen können nicht freigegeben werden');
  }

  if (config.gistId && !config.githubToken) {
    warnings.push('GIST_ID ohne GH_TOKEN – State wird nur gelesen, nicht in den Gist geschrieben');
  }

  if (!cron.validate(config.runSchedule)) {
    warnings.push(`RUN_SCHEDULE ungültig ('${config.runSchedule}') – --schedule nicht nutzbar`);
  }

  return { errors, warnings };
}

/**
 * Validiert die Config. Kritische Fehler beenden den Prozess, bevor
 * irgendein State angefasst wird.
 */
export function validateConfig(config: Config): void {
  const { errors, warnings } = collectConfigProblems(config);

  if (warnings.length > 0) {
    console.warn('⚠️  [Config] Konfigurationswarnungen:');
    warnings.forEach(warning => console.warn(`   - ${warning}`));
  }

  if (errors.length > 0) {
    console.error('❌ [Config] KRITISCHE Konfigurationsfehler:');
    errors.forEach(error => console.error(`   - ${error}`));
    process.exit(1);
  }
}

export function logConfig(config: Config): void {
  console.log('[CONFIG] Konfiguration geladen:');
  console.log(`  Aviasales-Token: ${maskToken(config.aviasalesToken)}`);
  console.log(`  Bot-Token: ${maskToken(config.telegramBotToken)}`);
  console.log(`  Admin-Chat: ${config.adminChatId || '(nicht gesetzt)'}`);
  console.log(`  State-Datei: ${config.stateFile}`);
  console.log(`  Gist: ${config.gistId || '(nicht gesetzt)'}`);
}
