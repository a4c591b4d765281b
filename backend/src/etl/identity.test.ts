import { describe, expect, it } from 'vitest';
import { DuplicateProgramUrlError } from '../errors.js';
import { StreamIdentityResolver, type IdentityCandidate } from './identity.js';

function candidate(url: string, preferredId: number | null, fingerprint = 'same'): IdentityCandidate {
  return { url, preferredId, fingerprint };
}

describe('StreamIdentityResolver.resolve', () => {
  it('returns the same id on repeat sight and trims the url', () => {
    const resolver = new StreamIdentityResolver();
    const first = resolver.resolve('  https://a.test/1  ');
    expect(resolver.resolve('https://a.test/1')).toBe(first);
  });

  it('treats urls case-sensitively', () => {
    const resolver = new StreamIdentityResolver();
    const lower = resolver.resolve('https://a.test/x');
    const upper = resolver.resolve('https://a.test/X');
    expect(upper).not.toBe(lower);
  });

  it('keeps persisted ids and allocates past the highest claimed one', () => {
    const resolver = new StreamIdentityResolver([['https://a.test/x', 5]]);
    expect(resolver.resolve('https://a.test/x', 99)).toBe(5);
    expect(resolver.resolve('https://a.test/y', 5)).toBe(6);
    expect(resolver.resolve('https://a.test/z', 3)).toBe(3);
    expect(resolver.resolve('https://a.test/w')).toBe(7);
  });

  it('rejects blank urls', () => {
    expect(() => new StreamIdentityResolver().resolve('   ')).toThrow('program_url must not be blank');
  });
});

describe('StreamIdentityResolver.resolveBatch', () => {
  it('assigns ids independently of input order', () => {
    const forward = new StreamIdentityResolver().resolveBatch([
      candidate('https://b.test', null),
      candidate('https://a.test', null),
    ]);
    const backward = new StreamIdentityResolver().resolveBatch([
      candidate('https://a.test', null),
      candidate('https://b.test', null),
    ]);
    expect([...forward.ids.entries()].sort()).toEqual([
      ['https://a.test', 1],
      ['https://b.test', 2],
    ]);
    expect([...backward.ids.entries()].sort()).toEqual([...forward.ids.entries()].sort());
  });

  it('gives a contested source id to the first url in sorted order', () => {
    const { ids } = new StreamIdentityResolver().resolveBatch([
      candidate('https://c.test', null),
      candidate('https://b.test', 10),
      candidate('https://a.test', 10),
    ]);
    expect(ids.get('https://a.test')).toBe(10);
    expect(ids.get('https://b.test')).toBe(11);
    expect(ids.get('https://c.test')).toBe(12);
  });

  it('rejects a url whose records disagree', () => {
    const { ids, rejected } = new StreamIdentityResolver().resolveBatch([
      candidate('https://a.test', 1, 'first'),
      candidate('https://a.test', 1, 'second'),
      candidate('https://b.test', 2),
    ]);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]).toBeInstanceOf(DuplicateProgramUrlError);
    expect(rejected[0]?.details).toEqual({ program_url: 'https://a.test', records: 2 });
    expect(ids.has('https://a.test')).toBe(false);
    expect(ids.get('https://b.test')).toBe(2);
  });

  it('collapses identical duplicates', () => {
    const { ids, rejected } = new StreamIdentityResolver().resolveBatch([
      candidate('https://a.test', 4),
      candidate(' https://a.test', 4),
    ]);
    expect(rejected).toEqual([]);
    expect([...ids.entries()]).toEqual([['https://a.test', 4]]);
  });
});
