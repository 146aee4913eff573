import { describe, it, expect } from 'vitest';
import {
  ModelProviderError,
  ParleyError,
  StorageError,
  ToolServerUnreachableError,
  ToolUnavailableError,
  UnauthenticatedError,
  ValidationError,
} from '../src/index.js';

describe('error taxonomy', () => {
  it('assigns a stable code and the class name to each error', () => {
    const cases: Array<[ParleyError, string, string]> = [
      [new UnauthenticatedError(), 'UNAUTHENTICATED', 'UnauthenticatedError'],
      [new ToolUnavailableError('web_search', 'timed out'), 'TOOL_UNAVAILABLE', 'ToolUnavailableError'],
      [new ToolServerUnreachableError('trends', 'connection refused'), 'TOOL_SERVER_UNREACHABLE', 'ToolServerUnreachableError'],
      [new ModelProviderError('rate limited'), 'MODEL_PROVIDER_FAILURE', 'ModelProviderError'],
      [new ValidationError('bad body'), 'VALIDATION_FAILURE', 'ValidationError'],
      [new StorageError('disk full'), 'STORAGE_FAILURE', 'StorageError'],
    ];

    for (const [err, code, name] of cases) {
      expect(err).toBeInstanceOf(ParleyError);
      expect(err.code).toBe(code);
      expect(err.name).toBe(name);
    }
  });

  it('formats tool failures with the tool name', () => {
    const err = new ToolUnavailableError('web_search', 'timed out after 50ms');
    expect(err.message).toBe('Tool web_search is unavailable: timed out after 50ms');
    expect(err.toolName).toBe('web_search');
  });

  it('keeps the cause', () => {
    const cause = new Error('ECONNREFUSED');
    const err = new ToolServerUnreachableError('trends', 'connection refused', { cause });
    expect(err.cause).toBe(cause);
    expect(err.message).toBe('Tool server "trends" unreachable: connection refused');
  });
});
