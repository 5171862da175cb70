import { describe, it, expect } from 'vitest';
import { formatFields, formatJson, formatTable, type TableColumn } from '../../../cli/lib/output.js';
import { EXIT_CODES, describeError, exitCodeFor } from '../../../cli/lib/exit-codes.js';
import { DataUnavailableError, InputInvalidError } from '../../../core/errors.js';

interface Row {
  readonly name: string;
  readonly count: number;
}

const COLUMNS: readonly TableColumn<Row>[] = [
  { header: 'Name', value: (row) => row.name },
  { header: '#', align: 'right', value: (row) => String(row.count) },
];

describe('formatTable', () => {
  it('should pad columns to the widest cell', () => {
    expect(formatTable([{ name: 'x', count: 10 }], COLUMNS)).toBe(
      ['Name |  #', '-----+---', 'x    | 10'].join('\n')
    );
  });

  it('should truncate cells beyond a fixed width', () => {
    const narrow: readonly TableColumn<Row>[] = [{ header: 'N', width: 4, value: (row) => row.name }];

    expect(formatTable([{ name: 'Reykjavik', count: 1 }], narrow).split('\n')[2]).toBe('Rey~');
  });

  it('should say so when there are no rows', () => {
    expect(formatTable([], COLUMNS)).toBe('No entries found.');
  });
});

describe('formatFields', () => {
  it('should align values after the longest label', () => {
    expect(formatFields([
      ['UTC', 'a'],
      ['Zone id', 'b'],
    ])).toBe('UTC:     a\nZone id: b');
  });
});

describe('formatJson', () => {
  it('should pretty-print by default', () => {
    expect(formatJson({ a: 1 })).toBe('{\n  "a": 1\n}');
    expect(formatJson({ a: 1 }, false)).toBe('{"a":1}');
  });
});

describe('exit codes', () => {
  it('should classify errors', () => {
    expect(exitCodeFor(new InputInvalidError('bad'))).toBe(EXIT_CODES.INPUT_ERROR);
    expect(exitCodeFor(new DataUnavailableError('gone', 'patches'))).toBe(
      EXIT_CODES.DATA_INTEGRITY_ERROR
    );
    expect(exitCodeFor(new Error('boom'))).toBe(EXIT_CODES.UNEXPECTED_ERROR);
  });

  it('should describe domain errors with their details', () => {
    expect(describeError(new InputInvalidError('bad latitude', 'latitude'))).toBe(
      'InputInvalidError: bad latitude\n  Field: latitude'
    );
    expect(describeError('plain')).toBe('plain');
  });
});
