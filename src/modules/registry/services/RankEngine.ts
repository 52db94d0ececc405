import { compareIdsDescending, type RankedUser, type RegistrySnapshot } from '../types.js';

export interface RankedPage {
  entries: RankedUser[];
  total: number;
  page: number;
  totalPages: number;
}

/**
 * Orders the registry by descending id, newest Discord accounts first.
 * Equal ids keep table order (Array.prototype.sort is stable).
 */
export function rankAll(snapshot: RegistrySnapshot): RankedUser[] {
  return [...snapshot]
    .sort((a, b) => compareIdsDescending(a.id, b.id))
    .map((record, index) => ({
      id: record.id,
      username: record.username,
      rank: index + 1,
    }));
}

/**
 * At most `n` entries from the top of the ranking
 */
export function topN(snapshot: RegistrySnapshot, n: number): RankedUser[] {
  if (n <= 0) return [];
  return rankAll(snapshot).slice(0, n);
}

/**
 * Every entry whose username matches, with its rank over the whole set.
 * Empty when the username is unknown.
 */
export function rankOf(snapshot: RegistrySnapshot, username: string): RankedUser[] {
  return rankAll(snapshot).filter(entry => entry.username === username);
}

/**
 * Zero-based page of the ranking. Out-of-range pages clamp to the last one.
 */
export function rankPage(snapshot: RegistrySnapshot, page: number, pageSize: number): RankedPage {
  const ranked = rankAll(snapshot);
  const size = Math.max(1, Math.floor(pageSize));
  const totalPages = Math.max(1, Math.ceil(ranked.length / size));
  const current = Math.min(Math.max(0, Math.floor(page)), totalPages - 1);

  return {
    entries: ranked.slice(current * size, (current + 1) * size),
    total: ranked.length,
    page: current,
    totalPages,
  };
}
