import { describe, expect, it } from 'vitest';
import { ADDITIONS_KEY, AdditionLog } from '../services/AdditionLog.js';
import { ConfigError } from '../types/errors.js';
import { MemoryDocumentStore } from './helpers/MemoryDocumentStore.js';

const clock = () => new Date('2026-01-05T21:00:00Z');

function entry(date: string, trackId: string, source: 'user' | 'auto' = 'auto') {
  return { date, trackId, trackName: `Song ${trackId}`, artist: 'Test Artist', source };
}

describe('AdditionLog', () => {
  it('records one row per date and track', async () => {
    const log = new AdditionLog(new MemoryDocumentStore(), clock);

    expect(await log.record(entry('2026-01-05', 'a'))).toBe(true);
    expect(await log.record(entry('2026-01-05', 'a', 'user'))).toBe(false);
    expect(await log.record(entry('2026-01-06', 'a'))).toBe(true);

    const rows = await log.load();
    expect(rows).toHaveLength(2);
    expect(rows[0]).toEqual({ ...entry('2026-01-05', 'a'), recordedAt: '2026-01-05T21:00:00.000Z' });
    expect(rows[1]?.date).toBe('2026-01-06');
  });

  it('filters a period inclusively', async () => {
    const log = new AdditionLog(new MemoryDocumentStore(), clock);
    for (const d of ['2026-01-01', '2026-01-02', '2026-01-03', '2026-01-04']) {
      await log.record(entry(d, `t-${d}`));
    }
    expect((await log.forPeriod('2026-01-02', '2026-01-03')).map((r) => r.date)).toEqual(['2026-01-02', '2026-01-03']);
  });

  it('skips unreadable rows and rejects a non-array document', async () => {
    const store = new MemoryDocumentStore();
    await store.set(ADDITIONS_KEY, [{ ...entry('2026-01-01', 'a'), recordedAt: 'x' }, { date: '2026-01-02' }, 'junk']);
    expect((await new AdditionLog(store, clock).load()).map((r) => r.trackId)).toEqual(['a']);

    await store.set(ADDITIONS_KEY, { rows: [] });
    await expect(new AdditionLog(store, clock).load()).rejects.toThrow(ConfigError);
  });
});
