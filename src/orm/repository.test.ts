import { beforeEach, describe, expect, it, vi } from 'vitest';
import { eq, gt, single } from '../compiler/index.js';
import { Database } from '../database.js';
import { BufferedRows, Row } from '../driver/row.js';
import type { Driver } from '../driver/types.js';
import { ConfigurationError, NotFoundError, ValidationError } from '../errors/index.js';
import { silentLogger } from '../logger.js';
import { Pagination, SearchFilter } from '../pagination/index.js';
import { Value } from '../value/index.js';
import { defineModel } from './model.js';
import { Repository } from './repository.js';

interface Note {
  id: number | null;
  title: string;
  body: string | null;
}

const Notes = defineModel<Note>({
  table: 'notes',
  create: () => ({ id: null, title: '', body: null }),
  columns: {
    id: { type: 'integer', primaryKey: true, autoIncrement: true },
    title: { type: 'string' },
    body: { type: 'text', nullable: true },
  },
});

const COLUMNS = ['id', 'title', 'body'];

function createMockDriver(): Driver {
  return {
    dialect: 'sqlite',
    connectionString: ':memory:',
    isOpen: true,
    query: vi.fn().mockImplementation(async () => new BufferedRows([], [])),
    execute: vi.fn().mockResolvedValue({ rowCount: 1 }),
    close: vi.fn(),
  };
}

function noteRows(...notes: [number, string][]): BufferedRows {
  return new BufferedRows(
    COLUMNS,
    notes.map(([id, title]) => new Row(COLUMNS, [Value.integer(id), Value.text(title), Value.null()]))
  );
}

function countRows(n: number): BufferedRows {
  return new BufferedRows(['COUNT(*)'], [new Row(['COUNT(*)'], [Value.integer(n)])]);
}

describe('Repository', () => {
  let driver: Driver;
  let notes: Repository<Note>;

  beforeEach(() => {
    driver = createMockDriver();
    notes = new Repository(Notes, new Database(driver, { logger: silentLogger }));
  });

  describe('create()', () => {
    it('should leave out an unset auto-increment key', async () => {
      const inserted = await notes.create({ id: null, title: 'Hello', body: null });

      expect(inserted).toBe(1);
      expect(driver.execute).toHaveBeenCalledWith('INSERT INTO notes (title, body) VALUES (?, ?)', [
        Value.text('Hello'),
        Value.null(),
      ]);
    });

    it('should send an explicit key', async () => {
      await notes.create({ id: 9, title: 'Nine', body: 'x' });

      expect(driver.execute).toHaveBeenCalledWith(
        'INSERT INTO notes (id, title, body) VALUES (?, ?, ?)',
        [Value.integer(9), Value.text('Nine'), Value.text('x')]
      );
    });

    it('should not write the generated key back', async () => {
      const note: Note = { id: null, title: 'Hello', body: null };
      await notes.create(note);
      expect(note.id).toBeNull();
    });
  });

  describe('findById()', () => {
    it('should query by key with LIMIT 1', async () => {
      vi.mocked(driver.query).mockResolvedValueOnce(noteRows([3, 'Three']));

      const found = await notes.findById(3);

      expect(found).toEqual({ id: 3, title: 'Three', body: null });
      expect(driver.query).toHaveBeenCalledWith(
        'SELECT id, title, body FROM notes WHERE id = ? LIMIT 1',
        [Value.integer(3)]
      );
    });

    it('should resolve to null when nothing matches', async () => {
      expect(await notes.findById(404)).toBeNull();
    });
  });

  describe('findByIdOrFail()', () => {
    it('should throw NotFoundError when nothing matches', async () => {
      await expect(notes.findByIdOrFail(404)).rejects.toThrow(
        new NotFoundError('No notes row with id = INTEGER(404)')
      );
    });
  });

  describe('findAll() and findWhere()', () => {
    it('should select every row', async () => {
      vi.mocked(driver.query).mockResolvedValueOnce(noteRows([1, 'a'], [2, 'b']));

      const all = await notes.findAll();

      expect(all.map((n) => n.title)).toEqual(['a', 'b']);
      expect(driver.query).toHaveBeenCalledWith('SELECT id, title, body FROM notes', []);
    });

    it('should apply the filter', async () => {
      await notes.findWhere(single(gt('id', 1)));

      expect(driver.query).toHaveBeenCalledWith('SELECT id, title, body FROM notes WHERE id > ?', [
        Value.integer(1),
      ]);
    });
  });

  describe('update()', () => {
    it('should set every non-key column by key', async () => {
      const changed = await notes.update({ id: 2, title: 'Two', body: 'more' });

      expect(changed).toBe(1);
      expect(driver.execute).toHaveBeenCalledWith(
        'UPDATE notes SET title = ?, body = ? WHERE id = ?',
        [Value.text('Two'), Value.text('more'), Value.integer(2)]
      );
    });

    it('should reject an entity without a key value', async () => {
      await expect(notes.update({ id: null, title: 'x', body: null })).rejects.toThrow(
        ValidationError
      );
      expect(driver.execute).not.toHaveBeenCalled();
    });
  });

  describe('delete()', () => {
    it('should resolve to true even when no row matched', async () => {
      vi.mocked(driver.execute).mockResolvedValueOnce({ rowCount: 0 });

      expect(await notes.deleteById(404)).toBe(true);
      expect(driver.execute).toHaveBeenCalledWith('DELETE FROM notes WHERE id = ?', [
        Value.integer(404),
      ]);
    });

    it('should delete an entity by its key', async () => {
      expect(await notes.delete({ id: 5, title: 'x', body: null })).toBe(true);
      expect(driver.execute).toHaveBeenCalledWith('DELETE FROM notes WHERE id = ?', [
        Value.integer(5),
      ]);
    });
  });

  describe('bulkDelete()', () => {
    it('should delete with IN and report the affected count', async () => {
      vi.mocked(driver.execute).mockResolvedValueOnce({ rowCount: 2 });

      expect(await notes.bulkDelete([1, 2, 99])).toBe(2);
      expect(driver.execute).toHaveBeenCalledWith('DELETE FROM notes WHERE id IN (?, ?, ?)', [
        Value.integer(1),
        Value.integer(2),
        Value.integer(99),
      ]);
    });

    it('should issue nothing for an empty list', async () => {
      expect(await notes.bulkDelete([])).toBe(0);
      expect(driver.execute).not.toHaveBeenCalled();
    });
  });

  describe('deleteWhere()', () => {
    it('should delete every matching row', async () => {
      vi.mocked(driver.execute).mockResolvedValueOnce({ rowCount: 4 });

      expect(await notes.deleteWhere(single(gt('id', 10)))).toBe(4);
      expect(driver.execute).toHaveBeenCalledWith('DELETE FROM notes WHERE id > ?', [
        Value.integer(10),
      ]);
    });
  });

  describe('count()', () => {
    it('should count rows matching the filter', async () => {
      vi.mocked(driver.query).mockResolvedValueOnce(countRows(3));

      expect(await notes.countWhere(single(eq('title', 'a')))).toBe(3);
      expect(driver.query).toHaveBeenCalledWith('SELECT COUNT(*) FROM notes WHERE title = ?', [
        Value.text('a'),
      ]);
    });
  });

  describe('createOrUpdate()', () => {
    it('should insert when the key is unset', async () => {
      await notes.createOrUpdate({ id: null, title: 'New', body: null });
      expect(vi.mocked(driver.execute).mock.calls[0]?.[0]).toBe(
        'INSERT INTO notes (title, body) VALUES (?, ?)'
      );
    });

    it('should update when the key is set', async () => {
      await notes.createOrUpdate({ id: 1, title: 'Old', body: null });
      expect(vi.mocked(driver.execute).mock.calls[0]?.[0]).toBe(
        'UPDATE notes SET title = ?, body = ? WHERE id = ?'
      );
    });
  });

  describe('findPaginated()', () => {
    it('should count first, then select the page', async () => {
      vi.mocked(driver.query)
        .mockResolvedValueOnce(countRows(5))
        .mockResolvedValueOnce(noteRows([3, 'c'], [4, 'd']));

      const page = await notes.findPaginated(Pagination.of(2, 2));

      expect(page.data.map((n) => n.id)).toEqual([3, 4]);
      expect(page.pagination.total).toBe(5);
      expect(page.pagination.totalPages).toBe(3);
      expect(vi.mocked(driver.query).mock.calls.map(([sql]) => sql)).toEqual([
        'SELECT COUNT(*) FROM notes',
        'SELECT id, title, body FROM notes LIMIT 2 OFFSET 2',
      ]);
    });
  });

  describe('search()', () => {
    it('should match the term in any of the columns', async () => {
      vi.mocked(driver.query).mockResolvedValueOnce(noteRows([1, 'Shopping']));

      const result = await notes.search(new SearchFilter('shop', ['title', 'body']));

      expect(driver.query).toHaveBeenCalledWith(
        'SELECT id, title, body FROM notes WHERE (title LIKE ?) OR (body LIKE ?)',
        [Value.text('%shop%'), Value.text('%shop%')]
      );
      expect(result.data).toHaveLength(1);
      expect(result.pagination.page).toBe(1);
      expect(result.pagination.perPage).toBe(1);
      expect(result.pagination.total).toBe(1);
    });
  });

  describe('models without a primary key', () => {
    it('should refuse key-based operations', async () => {
      const Events = defineModel<{ name: string }>({
        table: 'events',
        create: () => ({ name: '' }),
        columns: { name: { type: 'string' } },
      });
      const events = new Repository(Events, new Database(driver, { logger: silentLogger }));

      await expect(events.findById(1)).rejects.toThrow(
        new ConfigurationError('findById needs a primary key, but model "events" has none')
      );
    });
  });
});
