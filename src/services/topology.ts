import { ZPOOL_BIN } from '../config/config';
import { errorMessage } from '../errors/CustomError';
import { execFile } from 'node:child_process';

export type RunCommand = (command: string, args: readonly string[]) => Promise<string>;

const STATUS_TIMEOUT_MS = 10_000;

const defaultRun: RunCommand = (command, args) =>
  new Promise((resolve, reject) => {
    execFile(command, [...args], { timeout: STATUS_TIMEOUT_MS }, (err, stdout) => {
      if (err) return reject(err);
      resolve(stdout);
    });
  });

/**
 * True when `zpool status` output lists a `cache` vdev group inside the
 * config section (after the `NAME  STATE ...` header).
 */
export function parseHasCacheVdev(statusText: string): boolean {
  let inConfig = false;
  for (const raw of statusText.split('\n')) {
    const line = raw.trim();
    if (!inConfig) {
      inConfig = line.startsWith('NAME') && line.includes('STATE');
      continue;
    }
    if (line === 'cache') return true;
    if (line.startsWith('errors:')) break;
  }
  return false;
}

/**
 * Checks a pool for an L2ARC device. Any failure reads as "no L2ARC" so the
 * arcstat collector never requests fields the system would reject.
 */
export async function detectL2arc(
  poolName: string,
  run: RunCommand = defaultRun,
): Promise<boolean> {
  try {
    const status = await run(ZPOOL_BIN, ['status', poolName]);
    return parseHasCacheVdev(status);
  } catch (err) {
    console.warn(`[Topology] L2ARC detection failed for pool '${poolName}': ${errorMessage(err)}`);
    return false;
  }
}
