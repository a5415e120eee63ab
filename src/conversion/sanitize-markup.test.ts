import { describe, it, expect } from 'vitest';
import { colorFromClass, sanitizeMarkup } from './sanitize-markup.js';

describe('sanitizeMarkup', () => {
  it('unwraps a bare highlight mark and keeps its text unstyled', () => {
    expect(sanitizeMarkup('<mark>answer</mark>')).toBe('answer');
  });

  it('rewrites a highlight color class into an inline color', () => {
    const output = sanitizeMarkup('<span class="highlight-red">Link</span>');
    expect(output).toBe('<span style="color:red">Link</span>');
    expect(output).not.toContain('highlight-red');
  });

  it('turns a colored mark into a colored span', () => {
    expect(
      sanitizeMarkup('<mark class="highlight-red">Link-state</mark> protocol'),
    ).toBe('<span style="color:red">Link-state</span> protocol');
  });

  it('maps Notion palette names to CSS named colors', () => {
    expect(sanitizeMarkup('<span class="highlight-brown">x</span>')).toBe(
      '<span style="color:saddlebrown">x</span>',
    );
    expect(sanitizeMarkup('<span class="highlight-yellow">x</span>')).toBe(
      '<span style="color:gold">x</span>',
    );
  });

  it('passes unknown color names through', () => {
    expect(sanitizeMarkup('<span class="highlight-chartreuse">x</span>')).toBe(
      '<span style="color:chartreuse">x</span>',
    );
    expect(sanitizeMarkup('<span class="highlight-light_gray">x</span>')).toBe(
      '<span style="color:light_gray">x</span>',
    );
  });

  it('unwraps a span whose only style has a semicolon inside quotes', () => {
    expect(sanitizeMarkup(`<span style="font-family:'a;b'">x</span>`)).toBe(
      'x',
    );
  });

  it('unwraps a span whose style cannot be parsed', () => {
    expect(sanitizeMarkup('<span style="color:red{">x</span>')).toBe('x');
  });

  it('drops background color classes and styles', () => {
    expect(
      sanitizeMarkup('<span class="highlight-red_background">x</span>'),
    ).toBe('x');
    expect(
      sanitizeMarkup('<span style="background-color:yellow">x</span>'),
    ).toBe('x');
  });

  it('keeps the color of a block-color class on a div', () => {
    expect(
      sanitizeMarkup('<div class="block-color-blue" id="b1">Note</div>'),
    ).toBe('<div style="color:blue">Note</div>');
  });

  it('keeps only the href of a link', () => {
    expect(
      sanitizeMarkup(
        '<a href="https://example.com/page" id="x" data-track="1">link</a>',
      ),
    ).toBe('<a href="https://example.com/page">link</a>');
  });

  it('keeps emphasis and list markup', () => {
    const input =
      '<strong>bold</strong> <em>em</em> <i>i</i><ul><li>One</li><li>Two</li></ul><ol><li>First</li></ol>';
    expect(sanitizeMarkup(input)).toBe(input);
  });

  it('unwraps tags outside the allowed set', () => {
    expect(sanitizeMarkup('<p>Hello <strong>world</strong></p>')).toBe(
      'Hello <strong>world</strong>',
    );
  });

  it('drops script content entirely', () => {
    expect(sanitizeMarkup('<script>alert(1)</script>Safe')).toBe('Safe');
  });

  it('is idempotent', () => {
    const inputs = [
      '<mark class="highlight-red">Link-state</mark> protocol',
      '<p>Intro<br>Line <span class="highlight-blue" style="font-weight:bold">blue</span></p>',
      '<a href="https://example.com" class="link">x</a> &amp; <b>y</b>',
      '<div class="block-color-gray_background"><span class="highlight-teal">t</span></div>',
      `<span style="font-family:'a;b'">x</span>`,
      '<span style="color: blue; font-family: Menlo, monospace">code</span>',
    ];
    for (const input of inputs) {
      const once = sanitizeMarkup(input);
      expect(sanitizeMarkup(once)).toBe(once);
    }
  });
});

describe('colorFromClass', () => {
  it('reads both highlight and block-color classes', () => {
    expect(colorFromClass('highlight-pink')).toBe('deeppink');
    expect(colorFromClass('block-color-default')).toBe('black');
  });

  it('ignores background variants and unrelated classes', () => {
    expect(colorFromClass('highlight-pink_background')).toBeNull();
    expect(colorFromClass('selected-value')).toBeNull();
  });
});
