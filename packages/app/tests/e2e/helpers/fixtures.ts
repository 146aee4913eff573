import { mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import type { ParleyConfig } from '@parley/core';
import { DEFAULT_REMOTE_TOOL_SERVER, createLogger, mergeConfig } from '@parley/core';
import type { StubRemoteTool } from '@parley/tools';
import { StubRemoteToolServer } from '@parley/tools';

export const testLogger = createLogger({ level: 'silent' });

export function createTempDir(): string {
  const dir = join(tmpdir(), 'parley-test', randomUUID());
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function cleanupTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Config for an in-process run: ephemeral port, temp database, short timeouts. */
export function createTestConfig(dir: string): ParleyConfig {
  return mergeConfig({
    server: { host: '127.0.0.1', port: 0, heartbeatMs: 0, corsOrigins: ['http://app.test'] },
    agent: { maxIterations: 3, toolTimeoutMs: 1_000, turnTimeoutMs: 5_000 },
    tools: {
      remote: { name: 'trends', url: 'http://127.0.0.1:1/mcp', ...DEFAULT_REMOTE_TOOL_SERVER, cacheTtlMs: 0 },
    },
    storage: { dbPath: join(dir, 'parley.sqlite') },
    logging: { level: 'silent' },
  });
}

export const trendingTopicsTool: StubRemoteTool = {
  definition: {
    name: 'get_trending_topics',
    description: 'Trending topics for a region',
    inputSchema: { type: 'object', properties: { region: { type: 'string' } } },
  },
  run: (args) => ({ region: args['region'] ?? 'global', topics: ['solar eclipse', 'chess final'] }),
};

export const newsHeadlinesTool: StubRemoteTool = {
  definition: {
    name: 'get_news_headlines',
    description: 'Latest headlines for a topic',
    inputSchema: { type: 'object', properties: { topic: { type: 'string' } }, required: ['topic'] },
  },
  run: (args) => [`Headline about ${String(args['topic'])}`],
};

export function createTrendsServer(): StubRemoteToolServer {
  return new StubRemoteToolServer('trends', [trendingTopicsTool, newsHeadlinesTool]);
}
