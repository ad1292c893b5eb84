/**
 * Verdrahtet Config → konkrete Clients
 */

import { AviasalesClient } from './aviasales';
import type { Config } from './config';
import { FileStateStore, GistStateStore, LayeredStateRepository } from './stateStore';
import type { StateRepository } from './stateStore';
import { createTelegramGateway } from './telegram';
import type { TelegramGateway } from './telegram';

export function repositoryFromConfig(config: Config): StateRepository {
  const remote = config.gistId
    ? new GistStateStore({ gistId: config.gistId, token: config.githubToken, timeoutMs: config.gistTimeoutMs })
    : null;

  return new LayeredStateRepository({
    local: new FileStateStore(config.stateFile),
    remote,
    adminChatId: config.adminChatId,
  });
}

export function gatewayFromConfig(config: Config): TelegramGateway {
  return createTelegramGateway({
    botToken: config.telegramBotToken,
    footer: config.messageFooter,
    timeoutMs: config.telegramTimeoutMs,
  });
}

export function aviasalesClientFromConfig(config: Config): AviasalesClient {
  return new AviasalesClient({ token: config.aviasalesToken, timeoutMs: config.priceTimeoutMs });
}
