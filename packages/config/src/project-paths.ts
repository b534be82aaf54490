/**
 * Project Paths
 *
 * hookd keeps its own data (scheduler state, repair log, optional config)
 * in .hookd/ within the project root, so several projects can run their
 * own control plane without sharing state.
 */

import path from 'node:path';
import fs from 'node:fs';

/** Directory name within project root */
export const PROJECT_DATA_DIR = '.hookd';

const ROOT_MARKERS = ['.git', 'package.json', PROJECT_DATA_DIR, '.claude-flow'];

/**
 * Get the project root by looking for common markers
 */
export function findProjectRoot(startDir: string = process.cwd()): string {
  let current = path.resolve(startDir);
  const root = path.parse(current).root;

  while (current !== root) {
    for (const marker of ROOT_MARKERS) {
      if (fs.existsSync(path.join(current, marker))) {
        return current;
      }
    }
    current = path.dirname(current);
  }

  return path.resolve(startDir);
}

export interface ProjectPaths {
  /** The project root that was used */
  projectRoot: string;
  /** Root directory for all hookd data for this project */
  dataDir: string;
  /** Optional JSON config file */
  configPath: string;
  /** Persisted provider availability document */
  schedulerStatePath: string;
  /** JSON-lines log of registry repairs */
  repairLogPath: string;
  /** Output of a relay started in the background */
  relayLogPath: string;
}

export function getProjectPaths(projectRoot?: string): ProjectPaths {
  const root = projectRoot ?? findProjectRoot();
  const dataDir = path.join(root, PROJECT_DATA_DIR);

  return {
    projectRoot: root,
    dataDir,
    configPath: path.join(dataDir, 'config.json'),
    schedulerStatePath: path.join(dataDir, 'model-state.json'),
    repairLogPath: path.join(dataDir, 'watchdog-repairs.jsonl'),
    relayLogPath: path.join(dataDir, 'relay.log'),
  };
}
