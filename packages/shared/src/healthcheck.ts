import { writeFile } from 'node:fs/promises';
import { type SafeLogger } from './logger';

const DEFAULT_PATH = '/tmp/.worker-healthy';

export async function touchHealthFile(path: string = DEFAULT_PATH): Promise<void> {
  await writeFile(path, new Date().toISOString(), 'utf-8');
}

export interface HealthBeatOptions {
  intervalMs?: number;
  path?: string;
  logger?: SafeLogger;
}

/** Rewrites the health file on an interval so an external probe can check its age. */
export function startHealthBeat(opts: HealthBeatOptions = {}): { stop: () => void } {
  const path = opts.path ?? DEFAULT_PATH;
  const tick = () => {
    touchHealthFile(path).catch((err: unknown) => {
      opts.logger?.warn({ path, err: err instanceof Error ? err.message : String(err) }, 'Health file write failed');
    });
  };
  tick();
  const timer = setInterval(tick, opts.intervalMs ?? 5000);
  return {
    stop: () => clearInterval(timer),
  };
}
