import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  debug,
  getLogLevel,
  info,
  isDebugEnabled,
  levelFromEnv,
  onLog,
  setLogLevel,
  warn,
} from '../logger.js';
import type { LogEntry } from '../logger.js';
import { encodeRoman } from '../roman/encoder.js';

describe('logger', () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it('maps NUMERALS_DEBUG values to levels', () => {
    expect(levelFromEnv('1')).toBe('debug');
    expect(levelFromEnv('true')).toBe('debug');
    expect(levelFromEnv('warn')).toBe('warn');
    expect(levelFromEnv('error')).toBe('error');
    expect(levelFromEnv(undefined)).toBe('info');
    expect(levelFromEnv('verbose')).toBe('info');
  });

  it('drops entries below the current level', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('warn');
    const entries: LogEntry[] = [];
    const off = onLog((entry) => entries.push(entry));

    debug('hidden');
    info('hidden too');
    warn('shown', { code: 7 });
    off();

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ level: 'warn', message: 'shown', data: { code: 7 } });
    expect(infoSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('[Numerals] shown {"code":7}');
  });

  it('stops calling a callback once unsubscribed', () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    setLogLevel('info');
    const seen: string[] = [];
    const off = onLog((entry) => seen.push(entry.message));

    info('first');
    off();
    info('second');

    expect(seen).toEqual(['first']);
  });

  it('keeps logging when a callback throws', () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('info');
    const off = onLog(() => {
      throw new Error('boom');
    });

    expect(() => info('still fine')).not.toThrow();
    off();
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('reports debug mode', () => {
    setLogLevel('debug');
    expect(isDebugEnabled()).toBe(true);
    setLogLevel('info');
    expect(isDebugEnabled()).toBe(false);
  });

  it('traces magnitude blocks while encoding', () => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    setLogLevel('debug');
    const entries: LogEntry[] = [];
    const off = onLog((entry) => entries.push(entry));

    encodeRoman(40000);
    off();

    expect(entries.map((e) => e.data)).toEqual([
      { order: 4, half: false, unit: 10000 },
      { order: 4, half: true, unit: 50000 },
    ]);
  });
});
