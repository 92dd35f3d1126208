/**
 * Search/sort index
 *
 * Derives the visible track list from a source (the catalog or the active
 * playlist) given a search string, a search scope and a sort criterion.
 * Sorting is stable, so tracks with equal keys keep their source order and
 * the list looks the same every time it is rebuilt.
 */

import type { SearchScope, SortCriterion, Track } from '../types';

type Comparator = (a: Track, b: Track) => number;

const compareText = (a: string, b: string) =>
  a.localeCompare(b, undefined, { sensitivity: 'base' });

const COMPARATORS: Record<SortCriterion, Comparator> = {
  title: (a, b) => compareText(a.title, b.title),
  artist: (a, b) => compareText(a.artist, b.artist),
  album: (a, b) => compareText(a.album, b.album),
  duration: (a, b) => a.duration - b.duration,
};

function searchFields(track: Track, scope: SearchScope): string[] {
  switch (scope) {
    case 'title':
      return [track.title];
    case 'artist':
      return [track.artist];
    case 'album':
      return [track.album];
    case 'all':
      return [track.title, track.artist, track.album];
  }
}

export function matchesSearch(track: Track, query: string, scope: SearchScope = 'all'): boolean {
  if (query === '') return true;
  const needle = query.toLowerCase();
  return searchFields(track, scope).some((field) => field.toLowerCase().includes(needle));
}

/**
 * Stable sort that does not rely on the engine's Array#sort guarantees
 */
export function stableSort(tracks: readonly Track[], criterion: SortCriterion): Track[] {
  const compare = COMPARATORS[criterion];
  return tracks
    .map((track, index) => ({ track, index }))
    .sort((a, b) => compare(a.track, b.track) || a.index - b.index)
    .map(({ track }) => track);
}

export class ViewIndex {
  private search = '';
  private scope: SearchScope = 'all';
  private sort: SortCriterion = 'title';

  getSearch(): string {
    return this.search;
  }

  setSearch(text: string): void {
    this.search = text;
  }

  getScope(): SearchScope {
    return this.scope;
  }

  setScope(scope: SearchScope): void {
    this.scope = scope;
  }

  getSort(): SortCriterion {
    return this.sort;
  }

  setSort(criterion: SortCriterion): void {
    this.sort = criterion;
  }

  rebuild(sourceTracks: readonly Track[]): readonly Track[] {
    const filtered = sourceTracks.filter((track) => matchesSearch(track, this.search, this.scope));
    return Object.freeze(stableSort(filtered, this.sort));
  }
}
