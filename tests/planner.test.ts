import { describe, it, expect } from 'vitest';
import { QueryError } from '../src/errors.js';
import { parseFilter } from '../src/filter.js';
import { planQuery, resolveWindow } from '../src/planner.js';
import { MemoryEntryStore } from '../src/store.js';
import { formatIsoTimestamp } from '../src/timestamp.js';

function seededStore(): MemoryEntryStore {
  const store = new MemoryEntryStore();
  store.append(
    [880, 999, 1000, 1001, 1120, 1121].map((epochSeconds) => ({
      epochSeconds,
      isoTimestamp: formatIsoTimestamp(epochSeconds),
      component: 'reaper',
      message: `tick ${epochSeconds}`,
    }))
  );
  return store;
}

describe('resolveWindow', () => {
  it('spans the radius on both sides', () => {
    expect(resolveWindow({ center: 1000, radiusSeconds: 120 })).toEqual({ from: 880, to: 1120 });
  });
});

describe('planQuery', () => {
  it('selects the inclusive window', () => {
    const result = planQuery(seededStore(), { center: 1000, radiusSeconds: 120, filters: [] });

    expect(result.range).toEqual({ from: 880, to: 1120 });
    expect(result.entries.map((entry) => entry.epochSeconds)).toEqual([880, 999, 1000, 1001, 1120]);
  });

  it('selects a single second with a zero radius', () => {
    const result = planQuery(seededStore(), { center: 1000, radiusSeconds: 0, filters: [] });

    expect(result.entries.map((entry) => entry.message)).toEqual(['tick 1000']);
  });

  it('applies filters and the limit', () => {
    const result = planQuery(seededStore(), {
      center: 1000,
      radiusSeconds: 200,
      filters: [parseFilter('!tick 1000')],
      limit: 3,
    });

    expect(result.entries.map((entry) => entry.epochSeconds)).toEqual([880, 999, 1001]);
  });

  it('treats an empty window as a normal outcome', () => {
    const result = planQuery(seededStore(), { center: 5000, radiusSeconds: 10, filters: [] });

    expect(result.entries).toEqual([]);
  });

  it('rejects a negative radius', () => {
    expect(() => planQuery(seededStore(), { center: 1000, radiusSeconds: -1, filters: [] })).toThrow(
      "Invalid range '-1'. Use a whole number of seconds >= 0 (e.g. 120)"
    );
  });

  it('rejects a limit below one', () => {
    expect(() => planQuery(seededStore(), { center: 1000, radiusSeconds: 1, filters: [], limit: 0 })).toThrow(
      QueryError
    );
  });

  it('rejects a fractional center', () => {
    expect(() => planQuery(seededStore(), { center: 1.5, radiusSeconds: 1, filters: [] })).toThrow(
      'Invalid target 1.5: expected whole epoch seconds'
    );
  });
});
