import { describe, it, expect } from '@jest/globals';
import {
  escapeFilterValue,
  filter,
  fixed,
  float,
  formatFloat,
  formatNumber,
  joinFilters,
  renderTemplate,
  EMPTY,
} from '../security/escape.js';
import { CompileInvariantViolation } from '../shared/errors.js';

describe('escapeFilterValue', () => {
  it('escapes filter metacharacters', () => {
    expect(escapeFilterValue('a:b').text).toBe('a\\:b');
    expect(escapeFilterValue("it's").text).toBe("it\\'s");
    expect(escapeFilterValue('50%').text).toBe('50%%');
    expect(escapeFilterValue('[x];y,z').text).toBe('\\[x\\]\\;y\\,z');
  });

  it('escapes backslashes before anything else', () => {
    expect(escapeFilterValue('a\\b').text).toBe('a\\\\b');
    // `\:` becomes `\\` + `\:`, never `\\\\:`
    expect(escapeFilterValue('\\:').text).toBe('\\\\\\:');
  });

  it('leaves plain text alone', () => {
    expect(escapeFilterValue('Hello world').text).toBe('Hello world');
  });
});

describe('filter tag', () => {
  it('splices safe parts and numbers', () => {
    expect(filter`eq=brightness=${float(0.2)}`.text).toBe('eq=brightness=0.2');
    expect(filter`scale=${1280}:${720}`.text).toBe('scale=1280:720');
    expect(filter`drawtext=text='${escapeFilterValue('a:b')}'`.text).toBe("drawtext=text='a\\:b'");
  });

  it('rejects non-finite numbers', () => {
    expect(() => filter`setpts=${Number.NaN}*PTS`).toThrow(CompileInvariantViolation);
  });
});

describe('number formatting', () => {
  it('keeps a trailing .0 for integral floats only', () => {
    expect(formatFloat(25)).toBe('25.0');
    expect(formatFloat(0.5)).toBe('0.5');
    expect(float(-1).text).toBe('-1.0');
    expect(formatNumber(25)).toBe('25');
    expect(formatNumber(0.25)).toBe('0.25');
  });

  it('rounds fixed values', () => {
    expect(fixed(1 / 3, 3).text).toBe('0.333');
  });

  it('throws on infinity', () => {
    expect(() => formatNumber(Infinity)).toThrow(CompileInvariantViolation);
  });
});

describe('joinFilters', () => {
  it('joins with the chosen separator', () => {
    expect(joinFilters([filter`hflip`, filter`vflip`]).text).toBe('hflip,vflip');
    expect(joinFilters([filter`a`, 3], ':').text).toBe('a:3');
  });

  it('EMPTY is empty', () => {
    expect(EMPTY.isEmpty).toBe(true);
    expect(filter`x`.isEmpty).toBe(false);
  });
});

describe('renderTemplate', () => {
  it('substitutes every placeholder', () => {
    const text = renderTemplate('noise=alls={strength}:allf=t', { strength: 20 });
    expect(text.text).toBe('noise=alls=20:allf=t');
  });

  it('keeps escaped values escaped', () => {
    const text = renderTemplate('drawtext=text={t}', { t: escapeFilterValue('x,y') });
    expect(text.text).toBe('drawtext=text=x\\,y');
  });

  it('throws when a value is missing', () => {
    expect(() => renderTemplate('eq=gamma={gamma}', {})).toThrow(CompileInvariantViolation);
  });

  it('serialises to its text in JSON', () => {
    expect(JSON.stringify({ f: filter`hflip` })).toBe('{"f":"hflip"}');
  });
});
