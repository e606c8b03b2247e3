import { describe, it, expect } from 'vitest';
import { collapseWhitespace, normalizeSql } from '../../../src/services/candidate/normalize.js';

describe('normalizeSql', () => {
  it('should strip a fenced code block and trailing semicolon', () => {
    expect(normalizeSql('```sql\nSELECT *\n  FROM sales;\n```')).toBe('SELECT * FROM sales');
  });

  it('should strip an SQL label', () => {
    expect(normalizeSql('SQL: select 1;;')).toBe('select 1');
  });

  it('should leave clean SQL alone', () => {
    expect(normalizeSql('SELECT id FROM users')).toBe('SELECT id FROM users');
  });

  it('should keep semicolons that are not trailing', () => {
    expect(normalizeSql('SELECT 1; DROP TABLE sales;')).toBe('SELECT 1; DROP TABLE sales');
  });
});

describe('collapseWhitespace', () => {
  it('should collapse runs of whitespace outside quotes', () => {
    expect(collapseWhitespace("SELECT  'a   b'\n\tFROM t")).toBe("SELECT 'a   b' FROM t");
  });

  it('should drop leading whitespace', () => {
    expect(collapseWhitespace('  \n SELECT 1')).toBe('SELECT 1');
  });
});
