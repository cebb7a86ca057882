import { InvalidArgumentError } from 'commander';
import { ConfigError, createApplication, InvalidPageError, type Application } from '../core/index.js';

export interface RaceCommandOptions {
  depth?: number;
}

/**
 * Parse `--depth`; the allowed range is checked with the rest of the race configuration
 */
export function parseDepth(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('depth must be a whole number');
  }
  return parseInt(value, 10);
}

export function formatPath(path: string[]): string {
  return path.length > 0 ? path.join(' -> ') : 'No path found';
}

export async function runRace(start: string, finish: string, options: RaceCommandOptions): Promise<void> {
  let app: Application;
  try {
    app = createApplication({ searchDepth: options.depth });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  try {
    const racer = await app.start();
    const path = await racer.findPath(start, finish);
    console.log(formatPath(path));
  } catch (error) {
    if (error instanceof InvalidPageError) {
      console.error(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  } finally {
    await app.shutdown('race finished');
  }
}
