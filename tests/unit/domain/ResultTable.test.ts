import { describe, it, expect } from 'vitest';
import { ResultTable } from '../../../src/domain/model/ResultTable.js';
import type { ExtractionRow } from '../../../src/domain/model/ExtractionRow.js';

function row(source: string, target = `${source}-t`): ExtractionRow {
  return { source, target, exampleSource: `${source} line`, exampleTarget: `${target} line` };
}

describe('ResultTable', () => {
  it('should append rows in insertion order', () => {
    const table = new ResultTable();
    expect(table.add(row('b'))).toBe(true);
    expect(table.add(row('a'))).toBe(true);

    expect(table.rows.map((r) => r.source)).toEqual(['b', 'a']);
    expect(table.size).toBe(2);
  });

  it('should keep the first row for a key and reject later ones', () => {
    const table = new ResultTable();
    table.add(row('дом', 'house'));

    expect(table.add(row('дом', 'home'))).toBe(false);
    expect(table.rows).toEqual([row('дом', 'house')]);
    expect(table.has('дом')).toBe(true);
  });

  it('should compare keys exactly, without case folding', () => {
    const table = new ResultTable();
    table.add(row('Дом'));

    expect(table.add(row('дом'))).toBe(true);
    expect(table.add(row('дом '))).toBe(true);
    expect(table.size).toBe(3);
  });
});
