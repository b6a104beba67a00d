/**
 * Component: Category Filter Tests
 * Documentation: documentation/cleanup.md
 */

import { describe, expect, it } from 'vitest';
import { CategoryFilter } from '@/lib/filters/category.filter';
import { buildTorrent } from '../helpers/fixtures';

describe('CategoryFilter', () => {
  const torrents = [
    buildTorrent({ hash: 'tv', category: 'tv-sonarr' }),
    buildTorrent({ hash: 'manual', category: 'manual' }),
    buildTorrent({ hash: 'none', category: '' }),
  ];

  it('is a no-op without category rules', async () => {
    const result = await new CategoryFilter(undefined).filter(torrents);

    expect(result.map((torrent) => torrent.hash)).toEqual(['tv', 'manual', 'none']);
  });

  it('drops torrents in ignored categories', async () => {
    const result = await new CategoryFilter([{ name: 'manual', ignore: true }]).filter(torrents);

    expect(result.map((torrent) => torrent.hash)).toEqual(['tv', 'none']);
  });

  it('ignores rules that do not ask to ignore the category', async () => {
    const result = await new CategoryFilter([
      { name: 'tv-sonarr', ignore: false },
      { name: 'manual', ignore: true },
    ]).filter(torrents);

    expect(result.map((torrent) => torrent.hash)).toEqual(['tv', 'none']);
  });

  it('matches category names exactly', async () => {
    const result = await new CategoryFilter([{ name: 'Manual', ignore: true }]).filter(torrents);

    expect(result.map((torrent) => torrent.hash)).toEqual(['tv', 'manual', 'none']);
  });
});
