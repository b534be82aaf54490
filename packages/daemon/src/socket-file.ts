import fs from 'node:fs';

/**
 * Remove a leftover Unix socket file. Returns false when nothing was there;
 * refuses to touch anything that is not a socket.
 */
export function removeSocketFile(socketPath: string): boolean {
  let stat: fs.Stats;
  try {
    stat = fs.lstatSync(socketPath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return false;
    throw err;
  }
  if (!stat.isSocket()) {
    throw new Error(`Refusing to unlink non-socket at ${socketPath}`);
  }
  fs.unlinkSync(socketPath);
  return true;
}
