import { describe, it, expect } from 'vitest';
import {
  deduplicateListings,
  selectLatestVersion,
  toCandidateSummary,
} from '../src/services/deduplication';
import { makeListing } from './fakes';

describe('selectLatestVersion', () => {
  it('prefers the candidate with a later publication date', () => {
    const existing = makeListing({ publishedAt: '2024-01-01' });
    const candidate = makeListing({ publishedAt: '2024-01-05T10:00:00' });
    expect(selectLatestVersion(existing, candidate)).toBe(candidate);
  });

  it('keeps the existing version on equal dates', () => {
    const existing = makeListing({ publishedAt: '2024-01-05', employer: 'First' });
    const candidate = makeListing({ publishedAt: '2024-01-05', employer: 'Second' });
    expect(selectLatestVersion(existing, candidate)).toBe(existing);
  });

  it('treats an unparseable date as older than any real date', () => {
    const existing = makeListing({ publishedAt: 'not a date' });
    const candidate = makeListing({ publishedAt: '2023-12-31' });
    expect(selectLatestVersion(existing, candidate)).toBe(candidate);
    expect(selectLatestVersion(candidate, existing)).toBe(candidate);
  });
});

describe('deduplicateListings', () => {
  it('keeps the freshest version per refnr and drops empty refnrs', () => {
    const deduped = deduplicateListings([
      makeListing({ refnr: 'A', publishedAt: '2024-01-01' }),
      makeListing({ refnr: 'A', publishedAt: '2024-01-05' }),
      makeListing({ refnr: 'B', publishedAt: '' }),
      makeListing({ refnr: '', publishedAt: '2024-01-09' }),
    ]);

    expect([...deduped.keys()]).toEqual(['A', 'B']);
    expect(deduped.get('A')?.publishedAt).toBe('2024-01-05');
    expect(deduped.get('B')?.publishedAt).toBe('');
  });

  it('merges on the trimmed refnr and skips whitespace-only refnrs', () => {
    const first = makeListing({ refnr: ' A ', publishedAt: '2024-02-01' });
    const deduped = deduplicateListings([
      first,
      makeListing({ refnr: 'A', publishedAt: '2024-01-01' }),
      makeListing({ refnr: '   ', publishedAt: '2024-03-01' }),
    ]);

    expect(deduped.size).toBe(1);
    expect(deduped.get('A')).toBe(first);
  });

  it('keeps the first-seen copy among equal-date duplicates', () => {
    const deduped = deduplicateListings([
      makeListing({ refnr: 'A', publishedAt: '2024-01-01', employer: 'Old Name', queryTerm: 'python' }),
      makeListing({ refnr: 'A', publishedAt: '2024-01-01', employer: 'New Name', queryTerm: 'data' }),
    ]);
    expect(deduped.get('A')?.employer).toBe('Old Name');
  });

  it('selects the maximum date regardless of arrival order', () => {
    const dates = ['2024-01-03', '2024-01-09', '2024-01-01', '2024-01-09', '2024-01-07'];
    const listings = dates.map((publishedAt, index) =>
      makeListing({ refnr: 'A', publishedAt, title: `copy ${index}` })
    );

    const winner = deduplicateListings(listings).get('A');

    expect(winner?.publishedAt).toBe('2024-01-09');
    expect(winner?.title).toBe('copy 1');
  });
});

describe('toCandidateSummary', () => {
  it('projects the summary fields and normalizes the date', () => {
    const summary = toCandidateSummary(
      makeListing({
        refnr: 'A',
        title: 'Data Engineer',
        publishedAt: '2024-01-05T08:30:00',
        queryTerm: 'data',
        query: { wo: 'Berlin' },
      })
    );

    expect(summary).toEqual({
      title: 'Data Engineer',
      profession: 'Softwareentwickler/in',
      employer: 'Example GmbH',
      refnr: 'A',
      locality: 'Berlin',
      region: 'Berlin',
      distanceKm: '0',
      publishedAt: '2024-01-05',
      queryTerm: 'data',
    });
  });
});
