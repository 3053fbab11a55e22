import { describe, it, expect } from 'vitest';
import { DEFAULTS } from '../../config';
import { parseIndex } from '../index-loader';
import { Matcher, buildFuseOptions, buildQuery, tokenize } from '../matcher';
import { sampleIndex } from './fixtures';

const entries = parseIndex(sampleIndex);

describe('tokenize', () => {
  it('splits on whitespace and drops empties', () => {
    expect(tokenize('  actor   model ', 32)).toEqual(['actor', 'model']);
  });

  it('caps the query before splitting', () => {
    expect(tokenize('abcdef ghi', 4)).toEqual(['abcd']);
  });

  it('never splits a surrogate pair at the cap', () => {
    expect(tokenize('a\u{1F600}b', 2)).toEqual(['a\u{1F600}']);
  });

  it('returns nothing for blank input', () => {
    expect(tokenize('   ', 32)).toEqual([]);
  });
});

describe('buildQuery', () => {
  it('returns null for no tokens', () => {
    expect(buildQuery([])).toBeNull();
  });

  it('uses the bare token for a single word', () => {
    expect(buildQuery(['actor'])).toBe('actor');
  });

  it('requires every word to hit some field', () => {
    expect(buildQuery(['actor', 'model'])).toEqual({
      $and: [
        { $or: [{ title: 'actor' }, { summary: 'actor' }, { content: 'actor' }, { tags: 'actor' }, { categories: 'actor' }] },
        { $or: [{ title: 'model' }, { summary: 'model' }, { content: 'model' }, { tags: 'model' }, { categories: 'model' }] },
      ],
    });
  });
});

describe('buildFuseOptions', () => {
  it('weights title above body text above taxonomies', () => {
    const options = buildFuseOptions(DEFAULTS.search);
    expect(options.keys).toEqual([
      { name: 'title', weight: 0.8 },
      { name: 'summary', weight: 0.7 },
      { name: 'content', weight: 0.5 },
      { name: 'tags', weight: 0.3 },
      { name: 'categories', weight: 0.3 },
    ]);
    expect(options.threshold).toBe(0);
    expect(options.ignoreLocation).toBe(true);
    expect(options.shouldSort).toBe(true);
  });
});

describe('Matcher', () => {
  const matcher = new Matcher(entries, DEFAULTS.search);

  it('finds a post by a word in its title, ignoring case', () => {
    const titles = matcher.search('actor').map((r) => r.item.title);
    expect(titles).toContain('Actor Model');
  });

  it('returns nothing for text that appears nowhere', () => {
    expect(matcher.search('zzz-no-such-token')).toEqual([]);
  });

  it('ranks a title hit above a tag hit', () => {
    const results = matcher.search('actor');
    expect(results.map((r) => r.item.permalink)).toEqual(['/posts/actor-model/', '/posts/channels/']);
    expect(results[0]?.score).toBeLessThan(results[1]?.score ?? 0);
  });

  it('matches words across different fields', () => {
    const results = matcher.search('actor channels');
    expect(results.map((r) => r.item.permalink)).toEqual(['/posts/channels/']);
  });

  it('reports the position of the entry in the index', () => {
    expect(matcher.search('span').map((r) => r.refIndex)).toEqual([2]);
  });

  it('ignores text beyond the maximum query length', () => {
    const long = `actor${' '.repeat(40)}zzz`;
    expect(matcher.search(long)).toHaveLength(2);
  });

  it('matches nothing for blank text', () => {
    expect(matcher.search('  ')).toEqual([]);
  });

  it('caps results when max_results is set', () => {
    const capped = new Matcher(entries, { ...DEFAULTS.search, max_results: 1 });
    expect(capped.search('actor').map((r) => r.item.title)).toEqual(['Actor Model']);
  });

  it('returns nothing over an empty index', () => {
    expect(new Matcher([], DEFAULTS.search).search('actor')).toEqual([]);
  });
});
