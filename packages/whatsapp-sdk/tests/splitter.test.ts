import { describe, expect, it } from 'vitest';

import {
  WHATSAPP_MAX_MESSAGE_LENGTH,
  splitByFixedWidth,
  splitByParagraphs,
  splitMessage,
} from '../src/splitter';

describe('splitMessage', () => {
  it('returns short text as a single chunk', () => {
    expect(splitMessage('hello')).toEqual(['hello']);
    expect(splitMessage('x'.repeat(WHATSAPP_MAX_MESSAGE_LENGTH))).toHaveLength(1);
  });

  it('splits at headers first', () => {
    const text = '*_One_*\naaaaaaaaaa\n*_Two_*\nbbbbbbbbbb';

    expect(splitMessage(text, 20)).toEqual(['*_One_*\naaaaaaaaaa\n', '*_Two_*\nbbbbbbbbbb']);
  });

  it('keeps text before the first header as its own chunk', () => {
    const text = 'intro\n*_One_*\naaaaaaaaaa\n*_Two_*\nbbbb';

    expect(splitMessage(text, 20)).toEqual(['intro\n', '*_One_*\naaaaaaaaaa\n', '*_Two_*\nbbbb']);
  });

  it('falls back to bold spans', () => {
    const text = '*One* aaaaaaaaaaaaa *Two* bbbbbbbbbbbbb';

    expect(splitMessage(text, 20)).toEqual(['*One* aaaaaaaaaaaaa ', '*Two* bbbbbbbbbbbbb']);
  });

  it('falls back to paragraphs', () => {
    expect(splitMessage('alpha\n\nbeta\n\ngamma delta', 12)).toEqual([
      'alpha\n\nbeta',
      'gamma delta',
    ]);
  });

  it('sends an oversized header section through bold spans, then paragraphs', () => {
    const section = `*_A_* intro\n*c* ${'p'.repeat(15)}\n\n${'q'.repeat(15)}\n`;
    const text = `${section}*_B_* end`;

    expect(splitMessage(text, 30)).toEqual([
      '*_A_* intro\n',
      `*c* ${'p'.repeat(15)}`,
      `${'q'.repeat(15)}\n`,
      '*_B_* end',
    ]);
  });

  it('rejoins marker splits into the original text', () => {
    const text = 'intro\n*_One_*\naaaaaaaaaa\n*_Two_*\n*x* bbbbbbbbbbbbbbbbbbbb *y* cc';

    expect(splitMessage(text, 20).join('')).toBe(text);
  });

  it('rejoins paragraph splits with their separators', () => {
    const text = ['alpha beta', 'gamma', 'delta epsilon', 'zeta'].join('\n\n');

    expect(splitMessage(text, 16).join('\n\n')).toBe(text);
  });

  it.each([
    ['*_A_* intro\n*c* pppp pppp pppp\n\nqqqq\n*_B_* end', 30],
    [['*_Intro_*', 'word '.repeat(30), '*bold*', 'x'.repeat(70)].join('\n\n'), 40],
    ['one\n\n\ntwo three four five\n\nsix', 10],
  ])('keeps every visible character of %j', (text, limit) => {
    const visible = (value: string) => value.replace(/\s+/g, '');

    expect(visible(splitMessage(text, limit).join(''))).toBe(visible(text));
  });

  it('never produces a chunk above the limit', () => {
    const text = ['*_Intro_*', 'word '.repeat(30), '*bold*', 'x'.repeat(70)].join('\n\n');

    for (const chunk of splitMessage(text, 40)) {
      expect(chunk.length).toBeLessThanOrEqual(40);
      expect(chunk.length).toBeGreaterThan(0);
    }
  });
});

describe('splitByParagraphs', () => {
  it('cuts an oversized paragraph into windows', () => {
    expect(splitByParagraphs('ab\n\ncdefghijk', 5)).toEqual(['ab', 'cdefg', 'hijk']);
  });
});

describe('splitByFixedWidth', () => {
  it('cuts into equal windows', () => {
    expect(splitByFixedWidth('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('does not separate surrogate pairs', () => {
    expect(splitByFixedWidth('ab😀cd', 3)).toEqual(['ab', '😀c', 'd']);
  });
});
