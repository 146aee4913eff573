import { mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

export function createTestDbPath(): string {
  const dir = join(tmpdir(), 'parley-test', randomUUID());
  mkdirSync(dir, { recursive: true });
  return join(dir, 'test.sqlite');
}

export function cleanupTestDb(dbPath: string): void {
  rmSync(join(dbPath, '..'), { recursive: true, force: true });
}
