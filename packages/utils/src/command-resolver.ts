/**
 * Command Path Resolver
 *
 * Resolves full paths for CLI commands so the relay can decide whether a
 * persistent worker can be started, and so spawned processes do not depend
 * on an inherited PATH.
 */

import { execFileSync } from 'node:child_process';
import fs from 'node:fs';
import { createLogger } from './logger.js';

const log = createLogger('command-resolver');

const FALLBACK_PATH = '/usr/local/bin:/usr/bin:/bin:/opt/homebrew/bin';

/**
 * Resolve the full path of a command using `which`, following symlinks.
 * Returns null when the command cannot be located.
 */
export function resolveCommand(command: string): string | null {
  if (command.startsWith('/')) {
    return fs.existsSync(command) ? resolveSymlinks(command) : null;
  }

  try {
    const output = execFileSync('which', [command], {
      encoding: 'utf-8',
      stdio: ['pipe', 'pipe', 'pipe'],
      env: {
        ...process.env,
        PATH: process.env.PATH || FALLBACK_PATH,
      },
    });
    const resolvedPath = output.trim().split('\n')[0];
    if (resolvedPath) {
      return resolveSymlinks(resolvedPath);
    }
  } catch (err) {
    const message = err instanceof Error ? err.message.split('\n')[0] : String(err);
    log.debug(`'which ${command}' failed`, { error: message });
  }

  return null;
}

/**
 * Resolve symlinks to get the actual file path
 */
function resolveSymlinks(filePath: string): string {
  try {
    return fs.realpathSync(filePath);
  } catch (err) {
    log.debug('realpath failed', { filePath, error: err instanceof Error ? err.message : String(err) });
    return filePath;
  }
}
