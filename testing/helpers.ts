import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { vi } from 'vitest';

export const createTestLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

export const makeTempDir = (prefix = 'drive-strm-'): Promise<string> =>
  fs.mkdtemp(path.join(os.tmpdir(), prefix));

/** Every file under `root`, relative and `/`-separated, sorted. */
export async function listFiles(root: string): Promise<string[]> {
  const out: string[] = [];
  const walk = async (dir: string, rel: string): Promise<void> => {
    for (const e of await fs.readdir(dir, { withFileTypes: true })) {
      const childRel = rel ? `${rel}/${e.name}` : e.name;
      if (e.isDirectory()) await walk(path.join(dir, e.name), childRel);
      else out.push(childRel);
    }
  };
  await walk(root, '');
  return out.sort();
}
