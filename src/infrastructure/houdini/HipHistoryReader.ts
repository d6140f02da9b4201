import fs, { type Dirent } from 'fs';
import os from 'os';
import path from 'path';

export const HISTORY_FILE_NAME = 'file.history';

const SCENE_FILE = /\.hip(?:nc|lc)?$/i;

export interface RecentHipFile {
  path: string;
  exists: boolean;
}

/**
 * Scene paths from the HIP { ... } section of a Houdini file.history,
 * newest first and without repeats.
 */
export function parseHipHistory(content: string): string[] {
  const lines = content.split(/\r?\n/).map((line) => line.trim());
  const paths: string[] = [];

  let inSection = false;
  let sawHeader = false;
  for (const line of lines) {
    if (!inSection) {
      if (line === 'HIP{' || (sawHeader && line === '{')) {
        inSection = true;
      }
      sawHeader = line === 'HIP';
      continue;
    }
    if (line === '}') break;
    if (SCENE_FILE.test(line)) paths.push(line);
  }

  // the file lists oldest first
  const newestFirst: string[] = [];
  const seen = new Set<string>();
  for (let i = paths.length - 1; i >= 0; i--) {
    if (seen.has(paths[i])) continue;
    seen.add(paths[i]);
    newestFirst.push(paths[i]);
  }
  return newestFirst;
}

/**
 * file.history of the newest houdiniX.Y preference directory in `homeDir`
 */
export function findHistoryFile(homeDir: string): string | null {
  let entries: Dirent[];
  try {
    entries = fs.readdirSync(homeDir, { withFileTypes: true });
  } catch (error) {
    console.error(`[HipHistory] Cannot read ${homeDir}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }

  const prefDirs = entries
    .filter((entry) => entry.isDirectory() && /^houdini\d/.test(entry.name))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b, undefined, { numeric: true }));

  for (let i = prefDirs.length - 1; i >= 0; i--) {
    const candidate = path.join(homeDir, prefDirs[i], HISTORY_FILE_NAME);
    if (fs.existsSync(candidate)) return candidate;
  }
  return null;
}

/**
 * Recently opened scenes, from a configured history file or the user's
 * Houdini preferences
 */
export class HipHistoryReader {
  constructor(
    private readonly historyFile?: string,
    private readonly homeDir: string = os.homedir()
  ) {}

  getHistoryFile(): string | null {
    return this.historyFile ?? findHistoryFile(this.homeDir);
  }

  getRecentHipFiles(limit?: number): RecentHipFile[] {
    const historyFile = this.getHistoryFile();
    if (!historyFile) return [];

    let content: string;
    try {
      content = fs.readFileSync(historyFile, 'utf8');
    } catch (error) {
      console.error(`[HipHistory] Cannot read ${historyFile}: ${error instanceof Error ? error.message : String(error)}`);
      return [];
    }

    const paths = parseHipHistory(content);
    return (limit !== undefined ? paths.slice(0, limit) : paths).map((hipPath) => ({
      path: hipPath,
      exists: fs.existsSync(hipPath),
    }));
  }
}
