import { describe, it, expect } from 'vitest';
import { parseRecords, serializeRecords } from './csv.js';
import type { FlashcardRecord } from './table.js';

const withHeader = { header: true, tagSeparator: ' ' };

describe('serializeRecords', () => {
  it('writes the header and quotes fields that need it', () => {
    const records: FlashcardRecord[] = [
      {
        id: '1',
        front: 'Q, with comma',
        back: '<span style="color:red">A</span>',
        tags: ['OSPF-LSA', 'Routing'],
      },
    ];
    expect(serializeRecords(records, withHeader)).toBe(
      'Notion-ID,Front,Back,Tags\n1,"Q, with comma","<span style=""color:red"">A</span>",OSPF-LSA Routing',
    );
  });

  it('omits the header when asked', () => {
    const records: FlashcardRecord[] = [
      { id: '1', front: 'Q', back: 'A', tags: [] },
    ];
    expect(
      serializeRecords(records, { header: false, tagSeparator: ' ' }),
    ).toBe('1,Q,A,');
  });

  it('joins tags with the configured separator', () => {
    const records: FlashcardRecord[] = [
      { id: '1', front: 'Q', back: 'A', tags: ['a', 'b'] },
    ];
    expect(
      serializeRecords(records, { header: false, tagSeparator: ';' }),
    ).toBe('1,Q,A,a;b');
  });
});

describe('parseRecords', () => {
  it('reads back fields containing quotes, commas and newlines', () => {
    const records: FlashcardRecord[] = [
      {
        id: 'abc',
        front: 'Say "hi", then leave',
        back: 'line one\nline two<br/><b>bold</b>',
        tags: ['x', 'y-z'],
      },
      { id: 'def', front: 'Plain', back: '', tags: [] },
    ];
    const csv = serializeRecords(records, withHeader);
    expect(parseRecords(csv, withHeader)).toEqual(records);
  });

  it('splits on commas even when fields are full of semicolons', () => {
    const options = { header: false, tagSeparator: ' ' };
    const records: FlashcardRecord[] = [
      { id: '1', front: 'a;b;c', back: 'd;e;f', tags: ['x'] },
    ];
    const csv = serializeRecords(records, options);
    expect(csv).toBe('1,a;b;c,d;e;f,x');
    expect(parseRecords(csv, options)).toEqual(records);
  });

  it('rejects rows with the wrong number of columns', () => {
    expect(() =>
      parseRecords('1,Q,A\n', { header: false, tagSeparator: ' ' }),
    ).toThrow(/Row 1 does not have the columns/);
  });
});
