import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  info,
  levelFromEnv,
  logSolve,
  onLog,
  setLogLevel,
  timer,
  warn,
} from '../logger.js';
import type { LogEntry } from '../logger.js';

describe('logger', () => {
  const entries: LogEntry[] = [];
  let unsubscribe: () => void = () => {};

  beforeEach(() => {
    entries.length = 0;
    setLogLevel('info');
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    unsubscribe = onLog((entry) => entries.push(entry));
  });

  afterEach(() => {
    unsubscribe();
    vi.restoreAllMocks();
    setLogLevel('info');
  });

  it('maps ARMORY_DEBUG values to levels', () => {
    expect(levelFromEnv('1')).toBe('debug');
    expect(levelFromEnv('true')).toBe('debug');
    expect(levelFromEnv('warn')).toBe('warn');
    expect(levelFromEnv('error')).toBe('error');
    expect(levelFromEnv(undefined)).toBe('info');
    expect(levelFromEnv('verbose')).toBe('info');
  });

  it('prefixes console output and appends data as JSON', () => {
    info('loaded', { count: 3 });
    expect(console.info).toHaveBeenCalledWith('[Armory] loaded {"count":3}');
  });

  it('emits entries to subscribers', () => {
    warn('careful');
    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe('warn');
    expect(entries[0].message).toBe('careful');
  });

  it('suppresses entries below the current level', () => {
    setLogLevel('warn');
    info('quiet');
    expect(entries).toHaveLength(0);
  });

  it('stops delivering after unsubscribe', () => {
    unsubscribe();
    info('after');
    expect(entries).toHaveLength(0);
  });

  it('logs solver runs at debug level', () => {
    setLogLevel('debug');
    logSolve('greedy', 3, 2, 160, 0.5);
    expect(entries[0].message).toBe('solve[greedy]: 2/3 items, value 160');
    expect(entries[0].data).toEqual({
      strategy: 'greedy',
      items: 3,
      selected: 2,
      totalValue: 160,
      durationMs: 0.5,
    });
  });

  it('timer reports a non-negative duration', () => {
    setLogLevel('debug');
    const t = timer('work');
    const ms = t.end();
    expect(ms).toBeGreaterThanOrEqual(0);
    expect(entries[0].message.startsWith('work: ')).toBe(true);
    expect(entries[0].data?.durationMs).toBe(ms);
  });
});
