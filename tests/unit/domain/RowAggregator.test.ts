import { describe, it, expect } from 'vitest';
import { RowAggregator, stripCodeFences } from '../../../src/domain/services/RowAggregator.js';
import { ResultTable } from '../../../src/domain/model/ResultTable.js';
import { CsvParser } from '../../../src/infrastructure/parsers/CsvParser.js';

function createAggregator(table?: ResultTable): RowAggregator {
  return new RowAggregator(new CsvParser(), table);
}

describe('stripCodeFences', () => {
  it('should unwrap a fenced CSV block', () => {
    expect(stripCodeFences('```csv\nа,b,c,d\n```')).toBe('а,b,c,d\n');
  });

  it('should unwrap a fence without a language tag', () => {
    expect(stripCodeFences('\n```\nx,y,z,w\r\n```\n')).toBe('x,y,z,w\r\n');
  });

  it('should leave unfenced responses untouched', () => {
    expect(stripCodeFences('a,b,c,d\n')).toBe('a,b,c,d\n');
  });
});

describe('RowAggregator', () => {
  it('should parse four-column records into rows', () => {
    const aggregator = createAggregator();
    const step = aggregator.aggregate(
      'говорить,to speak,"Я говорю, ты слушаешь.","I speak, you listen."\nчитать,to read,Он читает.,He reads.\n',
    );

    expect(step.accepted).toEqual([
      {
        source: 'говорить',
        target: 'to speak',
        exampleSource: 'Я говорю, ты слушаешь.',
        exampleTarget: 'I speak, you listen.',
      },
      { source: 'читать', target: 'to read', exampleSource: 'Он читает.', exampleTarget: 'He reads.' },
    ]);
    expect(step.duplicates).toEqual([]);
    expect(step.malformed).toEqual([]);
    expect(aggregator.table.size).toBe(2);
  });

  it('should skip records without exactly four fields and keep the rest', () => {
    const aggregator = createAggregator();
    const step = aggregator.aggregate('a,1,2,3\nb,1,2\nc,1,2,3\n', { batchIndex: 2, category: 'nouns' });

    expect(step.accepted.map((r) => r.source)).toEqual(['a', 'c']);
    expect(step.malformed).toEqual([
      { recordIndex: 1, fields: ['b', '1', '2'], expectedFieldCount: 4, batchIndex: 2, category: 'nouns' },
    ]);
  });

  it('should report records with too many fields as malformed', () => {
    const step = createAggregator().aggregate('a,1,2,3,4\n');
    expect(step.accepted).toEqual([]);
    expect(step.malformed[0]?.fields).toEqual(['a', '1', '2', '3', '4']);
  });

  it('should not register the key of a malformed record', () => {
    const aggregator = createAggregator();
    aggregator.aggregate('a,1,2\n');
    const step = aggregator.aggregate('a,1,2,3\n');

    expect(step.accepted.map((r) => r.source)).toEqual(['a']);
  });

  it('should skip blank lines and all-empty records silently', () => {
    const step = createAggregator().aggregate('\n,,,\na,1,2,3\n\n');
    expect(step.accepted.map((r) => r.source)).toEqual(['a']);
    expect(step.malformed).toEqual([]);
  });

  it('should keep the first occurrence of a key across responses', () => {
    const aggregator = createAggregator();
    aggregator.aggregate('дом,house,Это дом.,This is a house.\n');
    const step = aggregator.aggregate('дом,home,Мой дом.,My home.\n');

    expect(step.accepted).toEqual([]);
    expect(step.duplicates.map((r) => r.target)).toEqual(['home']);
    expect(aggregator.table.rows).toEqual([
      { source: 'дом', target: 'house', exampleSource: 'Это дом.', exampleTarget: 'This is a house.' },
    ]);
  });

  it('should preserve first-seen order across responses', () => {
    const table = createAggregator().aggregateAll(['A,1,2,3\nB,1,2,3\n', 'B,4,5,6\nC,1,2,3\n']);
    expect(table.rows.map((r) => r.source)).toEqual(['A', 'B', 'C']);
    expect(table.rows[1]?.target).toBe('1');
  });

  it('should decode quoted fields with doubled quotes and line breaks', () => {
    const step = createAggregator().aggregate('"say ""hi""",x,"line one\nline two",z\n');
    expect(step.accepted).toEqual([
      { source: 'say "hi"', target: 'x', exampleSource: 'line one\nline two', exampleTarget: 'z' },
    ]);
  });

  it('should parse a fenced response', () => {
    const step = createAggregator().aggregate('```csv\nкот,cat,Кот спит.,The cat sleeps.\n```');
    expect(step.accepted.map((r) => r.source)).toEqual(['кот']);
    expect(step.malformed).toEqual([]);
  });

  it('should add to a table passed in', () => {
    const table = new ResultTable();
    table.add({ source: 'a', target: 'seed', exampleSource: '', exampleTarget: '' });

    const step = createAggregator(table).aggregate('a,1,2,3\nb,1,2,3\n');
    expect(step.duplicates.map((r) => r.source)).toEqual(['a']);
    expect(table.rows.map((r) => r.target)).toEqual(['seed', '1']);
  });

  it('should return an empty step for an empty response', () => {
    expect(createAggregator().aggregate('')).toEqual({ accepted: [], duplicates: [], malformed: [] });
  });
});
