import { describe, it, expect, vi, afterEach } from 'vitest';
import { getServerLog, serverLog } from '../../src/core/shared/serverLog.js';

describe('serverLog', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should mirror entries to stderr with a level prefix', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

    serverLog('ops', 'wrote note', 'warn');
    expect(spy).toHaveBeenCalledWith('[mdvault] WARN [ops] wrote note');
  });

  it('should filter by component and keep the newest entries', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    serverLog('config', 'first');
    serverLog('index', 'other');
    serverLog('config', 'second');

    const { entries } = getServerLog({ component: 'config', limit: 2 });
    expect(entries.map(e => e.message)).toEqual(['first', 'second']);
    expect(entries.every(e => e.component === 'config' && e.level === 'info')).toBe(true);
  });

  it('should keep only entries at or above the minimum level', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    serverLog('index', 'rebuilt');
    serverLog('index', 'duplicate name', 'warn');
    serverLog('index', 'unreadable', 'error');

    const { entries, matched } = getServerLog({ component: 'index', minLevel: 'warn', limit: 1 });
    expect(matched).toBe(2);
    expect(entries.map(e => e.message)).toEqual(['unreadable']);
  });

  it('should drop entries at or before since', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    serverLog('server', 'late');
    const { entries } = getServerLog({ since: Date.now() + 1000 });
    expect(entries).toEqual([]);
  });
});
