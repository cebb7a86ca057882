import {
  DEFAULT_COMPOSE_PATH,
  databaseUrlFromCompose,
  describeServices,
  loadComposeFile,
  type ComposeFile,
} from '../compose/index.js';
import { getConfig } from '../config/ConfigManager.js';
import { parseDatabaseUrl } from '../database/connection.js';

export interface ServicesCommandOptions {
  file?: string;
}

/**
 * One line per service ("name image host:container ..."), then the
 * connection URL of the postgres service
 */
export function formatServices(file: ComposeFile, databaseName: string, source?: string): string[] {
  const lines = describeServices(file, source).map((service) => {
    const ports = service.ports.map((port) => `${port.hostPort ?? '-'}:${port.containerPort}`);
    return [service.name, service.image, ...ports].join(' ');
  });

  if (file.services['postgres']) {
    lines.push(`database ${databaseUrlFromCompose(file, 'postgres', databaseName, source)}`);
  }
  return lines;
}

export async function runServices(options: ServicesCommandOptions): Promise<void> {
  const path = options.file ?? DEFAULT_COMPOSE_PATH;
  const file = await loadComposeFile(path);
  const { databaseName } = parseDatabaseUrl(getConfig().database.url);

  for (const line of formatServices(file, databaseName, path)) {
    console.log(line);
  }
}
