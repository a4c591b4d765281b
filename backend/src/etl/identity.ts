import { DuplicateProgramUrlError } from '../errors.js';

export type IdentityCandidate = {
  url: string;
  /** Id carried by the source row, used on first sight when still free. */
  preferredId: number | null;
  /** Canonical form of the record's attributes; equal fingerprints are the same record. */
  fingerprint: string;
};

export type IdentityResolution = {
  ids: Map<string, number>;
  rejected: DuplicateProgramUrlError[];
};

export function normalizeUrl(url: string | null | undefined): string | null {
  if (url == null) return null;
  const trimmed = url.trim();
  return trimmed.length ? trimmed : null;
}

function compareUrls(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Maps a program URL to its `program_stream_id`. URLs compare case-sensitively
 * after trimming. Ids already persisted are passed in as `known` and never
 * change; new URLs take their source id when it is free, otherwise the next id
 * after the highest one claimed.
 */
export class StreamIdentityResolver {
  private readonly byUrl = new Map<string, number>();
  private readonly claimed = new Set<number>();
  private nextId = 1;

  constructor(known: Iterable<readonly [string, number]> = []) {
    for (const [url, id] of known) {
      const key = normalizeUrl(url);
      if (key == null) continue;
      this.byUrl.set(key, id);
      this.claim(id);
    }
  }

  has(url: string): boolean {
    const key = normalizeUrl(url);
    return key != null && this.byUrl.has(key);
  }

  resolve(url: string, preferredId: number | null = null): number {
    const key = normalizeUrl(url);
    if (key == null) {
      throw new Error('program_url must not be blank');
    }
    const existing = this.byUrl.get(key);
    if (existing !== undefined) return existing;

    const id = preferredId != null && !this.claimed.has(preferredId) ? preferredId : this.allocate();
    this.byUrl.set(key, id);
    this.claim(id);
    return id;
  }

  /**
   * Resolves a whole extract. A URL seen on records with different
   * fingerprints is rejected as a whole; assignment then follows sorted URL
   * order so the outcome does not depend on row order.
   */
  resolveBatch(candidates: readonly IdentityCandidate[]): IdentityResolution {
    const groups = new Map<string, IdentityCandidate[]>();
    for (const candidate of candidates) {
      const key = normalizeUrl(candidate.url);
      if (key == null) continue;
      const group = groups.get(key) ?? [];
      group.push(candidate);
      groups.set(key, group);
    }

    const rejected: DuplicateProgramUrlError[] = [];
    const accepted: Array<{ url: string; preferredId: number | null }> = [];
    for (const url of [...groups.keys()].sort(compareUrls)) {
      const group = groups.get(url) ?? [];
      const fingerprints = new Set(group.map((candidate) => candidate.fingerprint));
      if (fingerprints.size > 1) {
        rejected.push(new DuplicateProgramUrlError(url, group.length));
        continue;
      }
      accepted.push({ url, preferredId: group[0]?.preferredId ?? null });
    }

    const ids = new Map<string, number>();
    const deferred: string[] = [];
    for (const { url, preferredId } of accepted) {
      if (this.has(url)) {
        ids.set(url, this.resolve(url));
      } else if (preferredId != null && !this.claimed.has(preferredId)) {
        ids.set(url, this.resolve(url, preferredId));
      } else {
        deferred.push(url);
      }
    }
    for (const url of deferred) {
      ids.set(url, this.resolve(url));
    }

    return { ids, rejected };
  }

  private claim(id: number): void {
    this.claimed.add(id);
    if (id >= this.nextId) this.nextId = id + 1;
  }

  private allocate(): number {
    while (this.claimed.has(this.nextId)) this.nextId += 1;
    return this.nextId;
  }
}
