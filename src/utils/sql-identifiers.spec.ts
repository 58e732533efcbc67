import { assertIdentifier, quoteIdentifier, quoteLiteral } from './sql-identifiers';

describe('sql identifiers', () => {
  it('accepts plain identifiers', () => {
    expect(assertIdentifier('QUICKSTART_PGCDC_DB', 'database')).toBe('QUICKSTART_PGCDC_DB');
    expect(assertIdentifier('_tmp$1', 'schema')).toBe('_tmp$1');
  });

  it('rejects anything that would need quoting', () => {
    expect(() => assertIdentifier('drop table; --', 'schema')).toThrow('Invalid schema identifier: "drop table; --"');
    expect(() => assertIdentifier('1abc', 'role')).toThrow('Invalid role identifier: "1abc"');
    expect(() => assertIdentifier('', 'role')).toThrow('Invalid role identifier: ""');
  });

  it('quotes identifiers preserving case', () => {
    expect(quoteIdentifier('healthcare')).toBe('"healthcare"');
    expect(() => quoteIdentifier('a"b')).toThrow('Invalid SQL identifier: "a"b"');
  });

  it('doubles single quotes in literals', () => {
    expect(quoteLiteral("O'Brien")).toBe("'O''Brien'");
  });
});
