import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { SuggestionHistoryRepository } from '../src/db/history';
import { FakeDetailSource } from './fakes';

describe('SuggestionHistoryRepository', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'history-test-'));
    filePath = join(dir, 'data', 'past_job_suggestions.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const readJson = async (): Promise<unknown> => JSON.parse(await readFile(filePath, 'utf-8'));

  const writeHistory = async (content: string) => {
    await writeFile(join(dir, 'history.json'), content, 'utf-8');
    filePath = join(dir, 'history.json');
  };

  describe('pruneInactive', () => {
    it('keeps only entries whose listing is still live and rewrites the file', async () => {
      await writeHistory(JSON.stringify([{ refnr: 'X' }, { refnr: 'Y' }]));
      const details = new FakeDetailSource({ X: 'Still open', Y: '' });

      const active = await new SuggestionHistoryRepository(filePath, details).pruneInactive();

      expect(active).toEqual([{ refnr: 'X' }]);
      expect(await readJson()).toEqual([{ refnr: 'X' }]);
    });

    it('drops entries without a refnr without checking them', async () => {
      await writeHistory(
        JSON.stringify([
          { company: 'No Ref GmbH' },
          { refnr: '', company: 'Empty Ref GmbH' },
          { refnr: 'X', company: 'Live GmbH', role: 'Engineer', date: '2024-01-01 09:00', note: 'kept' },
        ])
      );
      const details = new FakeDetailSource({ X: 'Still open' });

      const active = await new SuggestionHistoryRepository(filePath, details).pruneInactive();

      expect(details.requested).toEqual(['X']);
      expect(active).toEqual([
        { refnr: 'X', company: 'Live GmbH', role: 'Engineer', date: '2024-01-01 09:00', note: 'kept' },
      ]);
    });

    it('checks string refnrs of entries with other odd fields and skips non-string refnrs', async () => {
      await writeHistory(
        JSON.stringify([
          { company: null, refnr: ' X ' },
          { company: 'Numeric Ref AG', refnr: 12345 },
        ])
      );
      const details = new FakeDetailSource({ X: 'Still open' });

      const active = await new SuggestionHistoryRepository(filePath, details).pruneInactive();

      expect(details.requested).toEqual(['X']);
      expect(active).toEqual([{ company: null, refnr: ' X ' }]);
    });

    it('keeps file order among survivors', async () => {
      await writeHistory(JSON.stringify(['C', 'A', 'B', 'D'].map(refnr => ({ refnr }))));
      const details = new FakeDetailSource({ A: 'a', B: 'b', C: 'c' }, 3);

      const active = await new SuggestionHistoryRepository(filePath, details).pruneInactive();

      expect(active.map(entry => entry.refnr)).toEqual(['C', 'A', 'B']);
    });

    it('is idempotent', async () => {
      await writeHistory(JSON.stringify([{ refnr: 'X' }, { refnr: 'Y' }, { refnr: 'Z' }]));
      const repo = new SuggestionHistoryRepository(filePath, new FakeDetailSource({ X: 'x', Z: 'z' }));

      const first = await repo.pruneInactive();
      const second = await repo.pruneInactive();

      expect(second).toEqual(first);
      expect(await readJson()).toEqual([{ refnr: 'X' }, { refnr: 'Z' }]);
    });

    it('drops entries whose liveness check throws', async () => {
      await writeHistory(JSON.stringify([{ refnr: 'X' }, { refnr: 'Y' }]));
      const details = new FakeDetailSource({ X: new Error('boom'), Y: 'open' });

      const active = await new SuggestionHistoryRepository(filePath, details).pruneInactive();

      expect(active).toEqual([{ refnr: 'Y' }]);
    });

    it('treats a missing file as empty history and creates it', async () => {
      const active = await new SuggestionHistoryRepository(filePath, new FakeDetailSource({})).pruneInactive();

      expect(active).toEqual([]);
      expect(await readJson()).toEqual([]);
    });

    it('treats malformed JSON as empty history', async () => {
      await writeHistory('[{"refnr": "X"');

      const active = await new SuggestionHistoryRepository(filePath, new FakeDetailSource({ X: 'x' })).pruneInactive();

      expect(active).toEqual([]);
      expect(await readJson()).toEqual([]);
    });

    it('treats a non-array document as empty history', async () => {
      await writeHistory('{"refnr": "X"}');

      const active = await new SuggestionHistoryRepository(filePath, new FakeDetailSource({ X: 'x' })).pruneInactive();

      expect(active).toEqual([]);
    });
  });

  describe('append', () => {
    const now = () => new Date(2024, 2, 7, 9, 5, 42);

    it('appends stamped entries after the existing ones', async () => {
      await writeHistory(JSON.stringify([{ date: '2024-03-01 08:00', company: 'Old', role: 'Dev', refnr: 'OLD' }]));
      const repo = new SuggestionHistoryRepository(filePath, new FakeDetailSource({}), now);

      await repo.append([{ company: 'Example GmbH', role: 'Data Engineer', refnr: 'NEW' }]);

      expect(await readJson()).toEqual([
        { date: '2024-03-01 08:00', company: 'Old', role: 'Dev', refnr: 'OLD' },
        { date: '2024-03-07 09:05', company: 'Example GmbH', role: 'Data Engineer', refnr: 'NEW' },
      ]);
    });

    it('defaults absent fields to N/A', async () => {
      const repo = new SuggestionHistoryRepository(filePath, new FakeDetailSource({}), now);

      await repo.append([{ role: 'Analyst' }]);

      expect(await readJson()).toEqual([
        { date: '2024-03-07 09:05', company: 'N/A', role: 'Analyst', refnr: 'N/A' },
      ]);
    });

    it('keeps existing entries with unexpected field types', async () => {
      await writeHistory(
        JSON.stringify([
          { company: null, role: 'Dev', refnr: 'OLD' },
          { date: 20240301, company: 'Legacy AG', refnr: 7 },
        ])
      );
      const repo = new SuggestionHistoryRepository(filePath, new FakeDetailSource({}), now);

      await repo.append([{ company: 'Example GmbH', role: 'Data Engineer', refnr: 'NEW' }]);

      expect(await readJson()).toEqual([
        { company: null, role: 'Dev', refnr: 'OLD' },
        { date: 20240301, company: 'Legacy AG', refnr: 7 },
        { date: '2024-03-07 09:05', company: 'Example GmbH', role: 'Data Engineer', refnr: 'NEW' },
      ]);
    });

    it('drops only entries that are not objects', async () => {
      await writeHistory(JSON.stringify(['stray', 42, null, [1], { refnr: 'OLD' }]));
      const repo = new SuggestionHistoryRepository(filePath, new FakeDetailSource({}), now);

      await repo.append([{ company: 'A', role: 'B', refnr: 'NEW' }]);

      expect(await readJson()).toEqual([
        { refnr: 'OLD' },
        { date: '2024-03-07 09:05', company: 'A', role: 'B', refnr: 'NEW' },
      ]);
    });

    it('starts over from a malformed file', async () => {
      await writeHistory('not json');
      const repo = new SuggestionHistoryRepository(filePath, new FakeDetailSource({}), now);

      await repo.append([{ company: 'A', role: 'B', refnr: 'C' }]);

      expect(await readJson()).toEqual([{ date: '2024-03-07 09:05', company: 'A', role: 'B', refnr: 'C' }]);
    });

    it('does not interleave with a running prune', async () => {
      await writeHistory(JSON.stringify([{ refnr: 'X' }]));
      const repo = new SuggestionHistoryRepository(filePath, new FakeDetailSource({ X: 'x' }, 20), now);

      await Promise.all([repo.pruneInactive(), repo.append([{ company: 'A', role: 'B', refnr: 'NEW' }])]);

      expect(await readJson()).toEqual([
        { refnr: 'X' },
        { date: '2024-03-07 09:05', company: 'A', role: 'B', refnr: 'NEW' },
      ]);
    });
  });
});
