import { describe, expect, it } from 'vitest';
import { countWords, handleTokensRequest, splitWords } from './tokens.js';

const EMPTY_SHA256 = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';
const WORD_TOKEN = /^[0-9a-f]{16}$/;

describe('splitWords', () => {
  it('splits on runs of whitespace and drops empty fragments', () => {
    expect(splitWords('  hello \t big\n\nworld  ')).toEqual(['hello', 'big', 'world']);
  });

  it('returns no words for empty or blank text', () => {
    expect(splitWords('')).toEqual([]);
    expect(splitWords(' \n\t ')).toEqual([]);
  });

  it('splits on information separators and NEL', () => {
    expect(splitWords('a\u001cb')).toEqual(['a', 'b']);
    expect(splitWords('a\u001fb')).toEqual(['a', 'b']);
    expect(splitWords('a\u0085b')).toEqual(['a', 'b']);
  });

  it('does not split on a byte order mark', () => {
    expect(splitWords('a\ufeffb')).toEqual(['a\ufeffb']);
  });

  it('splits on no-break and ideographic spaces', () => {
    expect(splitWords('a\u00a0b\u3000c\u2009d')).toEqual(['a', 'b', 'c', 'd']);
  });

  it('keeps punctuation attached to words', () => {
    expect(countWords("it's a dog-eat-dog world, isn't it?")).toBe(6);
  });
});

describe('handleTokensRequest', () => {
  it('returns one token per word with the text checksum', () => {
    const result = handleTokensRequest({ text: 'hello world' });
    expect(result.checksum).toBe('b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9');
    expect(result.tokens).toHaveLength(2);
    for (const token of result.tokens) {
      expect(token).toMatch(WORD_TOKEN);
    }
  });

  it('issues a single token for empty text', () => {
    const result = handleTokensRequest({ text: '' });
    expect(result.checksum).toBe(EMPTY_SHA256);
    expect(result.tokens).toHaveLength(1);
    expect(result.tokens[0]).toMatch(WORD_TOKEN);
  });

  it('issues a single token for whitespace-only text but hashes it as given', () => {
    const result = handleTokensRequest({ text: '   ' });
    expect(result.checksum).toBe('0aad7da77d2ed59c396c99a74e49f3a4524dcdbcb5163251b1433d640247aeb4');
    expect(result.tokens).toHaveLength(1);
  });

  it('counts words separated by uncommon whitespace', () => {
    expect(handleTokensRequest({ text: 'a\u001cb' }).tokens).toHaveLength(2);
    expect(handleTokensRequest({ text: 'a\u001fb' }).tokens).toHaveLength(2);
    expect(handleTokensRequest({ text: 'a\u0085b' }).tokens).toHaveLength(2);
    expect(handleTokensRequest({ text: 'a\ufeffb' }).tokens).toHaveLength(1);
  });

  it('treats absent or null text as empty', () => {
    expect(handleTokensRequest({}).checksum).toBe(EMPTY_SHA256);
    expect(handleTokensRequest({ text: null }).tokens).toHaveLength(1);
  });

  it('matches max(1, word count) for assorted inputs', () => {
    const cases: [string, number][] = [
      ['one', 1],
      ['one two three four five', 5],
      ['\ttabbed\tand\nnewlined ', 3],
      ['repeat repeat repeat', 3],
    ];
    for (const [text, expected] of cases) {
      expect(handleTokensRequest({ text }).tokens).toHaveLength(expected);
    }
  });

  it('does not derive tokens from the text', () => {
    const first = handleTokensRequest({ text: 'same words' });
    const second = handleTokensRequest({ text: 'same words' });
    expect(second.checksum).toBe(first.checksum);
    expect(second.tokens).not.toEqual(first.tokens);
  });
});
