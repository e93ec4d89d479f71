import { describe, it, expect } from 'vitest';
import { countImages, placeholderFor, protectImages, restoreImages } from './imagePlaceholders';

describe('protectImages', () => {
  it('replaces images with positional placeholders', () => {
    const markdown = 'Intro ![a](img/a.png) middle ![b](img/b.png) end';
    const { text, table } = protectImages(markdown);

    expect(text).toBe('Intro <<IMG_0>> middle <<IMG_1>> end');
    expect(table).toEqual(['![a](img/a.png)', '![b](img/b.png)']);
  });

  it('keeps images with empty alt text', () => {
    const { text, table } = protectImages('![](pic.jpg)');

    expect(text).toBe('<<IMG_0>>');
    expect(table).toEqual(['![](pic.jpg)']);
  });

  it('gives repeated images their own slots', () => {
    const { text, table } = protectImages('![x](same.png)\n![x](same.png)');

    expect(text).toBe('<<IMG_0>>\n<<IMG_1>>');
    expect(table).toHaveLength(2);
  });

  it('leaves plain links alone', () => {
    const markdown = 'See [the docs](https://example.com/docs).';
    const { text, table } = protectImages(markdown);

    expect(text).toBe(markdown);
    expect(table).toEqual([]);
  });

  it('handles an empty string', () => {
    expect(protectImages('')).toEqual({ text: '', table: [] });
  });

  it('gives placeholder-shaped source text a slot of its own', () => {
    const { text, table } = protectImages('See <<IMG_0>> and ![a](a.png)');

    expect(text).toBe('See <<IMG_0>> and <<IMG_1>>');
    expect(table).toEqual(['<<IMG_0>>', '![a](a.png)']);
  });
});

describe('restoreImages', () => {
  it('puts every image back in place', () => {
    const markdown = '# Chapter\n\n![fig](fig1.png)\n\nText.\n\n![](fig2.png)';
    const { text, table } = protectImages(markdown);

    expect(restoreImages(text, table)).toBe(markdown);
  });

  it('follows placeholders the translator moved or repeated', () => {
    const table = ['![a](a.png)', '![b](b.png)'];

    expect(restoreImages('<<IMG_1>> then <<IMG_0>> and <<IMG_1>>', table))
      .toBe('![b](b.png) then ![a](a.png) and ![b](b.png)');
  });

  it('leaves dropped placeholders absent', () => {
    expect(restoreImages('only text', ['![a](a.png)'])).toBe('only text');
  });

  it('does not rescan text it has already restored', () => {
    const table = ['![<<IMG_1>>](x.png)', '![b](b.png)'];

    expect(restoreImages('<<IMG_0>> <<IMG_1>>', table)).toBe('![<<IMG_1>>](x.png) ![b](b.png)');
  });

  it('leaves placeholders without a table entry untouched', () => {
    expect(restoreImages('<<IMG_3>>', ['![a](a.png)'])).toBe('<<IMG_3>>');
  });

  it.each([
    '![<<IMG_1>>](x.png) ![b](b.png)',
    'See <<IMG_0>> and ![a](a.png)',
    '<<IMG_1>><<IMG_0>>![](<<IMG_0>>.png)',
    'Literal <<IMG_7>> with no images at all',
  ])('round-trips %j', (markdown) => {
    const { text, table } = protectImages(markdown);

    expect(restoreImages(text, table)).toBe(markdown);
  });

  it('does not confuse IMG_1 with IMG_10', () => {
    const table = Array.from({ length: 11 }, (_, i) => `![${i}](${i}.png)`);

    expect(restoreImages('<<IMG_10>> <<IMG_1>>', table)).toBe('![10](10.png) ![1](1.png)');
  });
});

describe('helpers', () => {
  it('formats placeholders', () => {
    expect(placeholderFor(7)).toBe('<<IMG_7>>');
  });

  it('counts images', () => {
    expect(countImages('![a](1) text ![b](2)')).toBe(2);
    expect(countImages('no images')).toBe(0);
    expect(countImages('<<IMG_0>> is not an image')).toBe(0);
  });
});
