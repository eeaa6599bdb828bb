import { execFileSync } from 'child_process';
import { accessSync, constants } from 'fs';
import { resolve } from 'path';
import { logger } from './logger.js';

const log = logger.child({ component: 'system' });

/**
 * Resolve a client binary to an executable path. Names containing a slash are
 * checked in place, bare names are looked up on PATH.
 */
export function findExecutable(bin: string): string | null {
  if (bin.includes('/')) {
    const path = resolve(bin);
    try {
      accessSync(path, constants.X_OK);
      return path;
    } catch {
      log.debug({ bin: path }, 'Client binary is not executable');
      return null;
    }
  }

  try {
    const found = execFileSync('which', [bin], { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'ignore'] }).trim();
    return found || null;
  } catch {
    log.debug({ bin }, 'Client binary not found on PATH');
    return null;
  }
}

export function getClientVersion(bin: string): string | null {
  try {
    const version = execFileSync(bin, ['--version'], { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'ignore'] }).trim();
    return version;
  } catch {
    return null;
  }
}
