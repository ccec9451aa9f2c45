import { describe, expect, it } from 'vitest';
import { splitSqlStatements } from './split.js';

describe('splitSqlStatements', () => {
  it('should split on top-level semicolons', () => {
    expect(splitSqlStatements('CREATE TABLE a (id INTEGER); CREATE TABLE b (id INTEGER);')).toEqual([
      'CREATE TABLE a (id INTEGER)',
      'CREATE TABLE b (id INTEGER)',
    ]);
  });

  it('should keep a final statement without a semicolon', () => {
    expect(splitSqlStatements('SELECT 1;\nSELECT 2')).toEqual(['SELECT 1', 'SELECT 2']);
  });

  it('should ignore semicolons inside strings and quoted identifiers', () => {
    const sql = `INSERT INTO t (v) VALUES ('a;b'); INSERT INTO "odd;name" (v) VALUES ('it''s;');`;
    expect(splitSqlStatements(sql)).toEqual([
      "INSERT INTO t (v) VALUES ('a;b')",
      `INSERT INTO "odd;name" (v) VALUES ('it''s;')`,
    ]);
  });

  it('should ignore semicolons inside comments', () => {
    const sql = '-- first; still a comment\nSELECT 1; /* a; b */ SELECT 2;';
    expect(splitSqlStatements(sql)).toEqual([
      '-- first; still a comment\nSELECT 1',
      '/* a; b */ SELECT 2',
    ]);
  });

  it('should drop chunks holding only comments', () => {
    expect(splitSqlStatements('-- name\n-- Created: now\n\n')).toEqual([]);
    expect(splitSqlStatements('SELECT 1; -- trailing note')).toEqual(['SELECT 1']);
  });

  it('should keep a trigger body together', () => {
    const sql = `CREATE TRIGGER touch AFTER UPDATE ON t BEGIN
  UPDATE t SET updated_at = 'now' WHERE id = NEW.id;
  INSERT INTO log (msg) VALUES ('touched');
END;
SELECT 1;`;
    expect(splitSqlStatements(sql)).toEqual([
      `CREATE TRIGGER touch AFTER UPDATE ON t BEGIN
  UPDATE t SET updated_at = 'now' WHERE id = NEW.id;
  INSERT INTO log (msg) VALUES ('touched');
END`,
      'SELECT 1',
    ]);
  });

  it('should not end a trigger at the END of a CASE expression', () => {
    const trigger = `CREATE TRIGGER tag_sign AFTER INSERT ON a BEGIN
  UPDATE a SET tag = CASE WHEN new.v > 0 THEN 'pos' ELSE 'neg' END WHERE id = new.id;
  UPDATE a SET seen = CASE new.v WHEN 0 THEN 0 ELSE 1 END;
END`;
    expect(splitSqlStatements(`${trigger};\nSELECT 1;`)).toEqual([trigger, 'SELECT 1']);
  });

  it('should not treat a column named end as a keyword', () => {
    const trigger = `CREATE TRIGGER span_check AFTER UPDATE ON spans BEGIN
  UPDATE spans SET length = new.end - new.start WHERE id = new.id;
  INSERT INTO log (msg) VALUES ('end;');
END`;
    expect(splitSqlStatements(`${trigger};\nSELECT 2;`)).toEqual([trigger, 'SELECT 2']);
  });

  it('should return nothing for blank input', () => {
    expect(splitSqlStatements('  \n ;; ')).toEqual([]);
  });
});
