import {
  isDefectAnnotated,
  normalizeBlade,
  normalizeStyle,
  normalizeText,
  parseFlex,
  parseQuantity,
  splitModelAndStyle,
} from './value-normalizer';

describe('normalizeText', () => {
  it('trims strings', () => {
    expect(normalizeText('  FT8 Pro ')).toBe('FT8 Pro');
  });

  it('stringifies numbers', () => {
    expect(normalizeText(5000)).toBe('5000');
  });

  it('treats empty and whitespace-only values as absent', () => {
    expect(normalizeText('')).toBeUndefined();
    expect(normalizeText('   ')).toBeUndefined();
    expect(normalizeText(null)).toBeUndefined();
    expect(normalizeText(undefined)).toBeUndefined();
  });
});

describe('normalizeBlade / normalizeStyle', () => {
  it('upper-cases after trimming', () => {
    expect(normalizeBlade(' l92 ')).toBe('L92');
    expect(normalizeStyle('red ')).toBe('RED');
  });

  it('keeps blank values absent', () => {
    expect(normalizeBlade('  ')).toBeUndefined();
    expect(normalizeStyle(null)).toBeUndefined();
  });
});

describe('splitModelAndStyle', () => {
  it('splits a trailing parenthetical', () => {
    expect(splitModelAndStyle('FT8 Pro (RED)')).toEqual({ base: 'FT8 Pro', style: 'RED' });
  });

  it('accepts full-width parentheses', () => {
    expect(splitModelAndStyle('FT6（red,black.blue,green）')).toEqual({
      base: 'FT6',
      style: 'red,black.blue,green',
    });
  });

  it('returns the whole label when there is no parenthetical', () => {
    expect(splitModelAndStyle('Plain Model')).toEqual({ base: 'Plain Model' });
  });

  it('only looks at a group at the very end', () => {
    expect(splitModelAndStyle('Vapor (2024) Jr')).toEqual({ base: 'Vapor (2024) Jr' });
  });

  it('drops an empty parenthetical style', () => {
    expect(splitModelAndStyle('Catalyst (  )')).toEqual({ base: 'Catalyst', style: undefined });
  });

  it('falls back to the full label when nothing precedes the group', () => {
    expect(splitModelAndStyle('(RED)')).toEqual({ base: '(RED)', style: 'RED' });
  });

  it('returns nothing for blank input', () => {
    expect(splitModelAndStyle('  ')).toEqual({});
  });
});

describe('parseFlex', () => {
  it('passes integers through', () => {
    expect(parseFlex(85)).toBe(85);
  });

  it('rounds other numbers', () => {
    expect(parseFlex(84.6)).toBe(85);
  });

  it('rounds halves to the even neighbour', () => {
    expect(parseFlex(84.5)).toBe(84);
    expect(parseFlex(85.5)).toBe(86);
    expect(parseFlex(-2.5)).toBe(-2);
  });

  it('takes the first digit run of a string', () => {
    expect(parseFlex('Flex 75 / 80')).toBe(75);
  });

  it('is absent without digits or for other types', () => {
    expect(parseFlex('stiff')).toBeUndefined();
    expect(parseFlex(true)).toBeUndefined();
    expect(parseFlex(null)).toBeUndefined();
    expect(parseFlex(Number.NaN)).toBeUndefined();
  });
});

describe('parseQuantity', () => {
  it('passes integers through', () => {
    expect(parseQuantity(10, true)).toBe(10);
  });

  it('rounds values within tolerance of an integer', () => {
    expect(parseQuantity(2.9999999999, true)).toBe(3);
  });

  it('truncates other fractional values', () => {
    expect(parseQuantity(4.7, true)).toBe(4);
  });

  it('extracts digits from ascii strings', () => {
    expect(parseQuantity(' 5 pcs ', true)).toBe(5);
  });

  it('excludes non-ascii annotated strings when exclusion is on', () => {
    expect(parseQuantity('5瑕疵', true)).toBeUndefined();
  });

  it('extracts digits from annotated strings when exclusion is off', () => {
    expect(parseQuantity('5瑕疵', false)).toBe(5);
  });

  it('is absent for empty strings, digit-free strings and other types', () => {
    expect(parseQuantity('  ', false)).toBeUndefined();
    expect(parseQuantity('n/a', false)).toBeUndefined();
    expect(parseQuantity(new Date(0), false)).toBeUndefined();
    expect(parseQuantity(Number.POSITIVE_INFINITY, false)).toBeUndefined();
  });
});

describe('isDefectAnnotated', () => {
  it('flags strings carrying non-ascii characters', () => {
    expect(isDefectAnnotated('3 瑕疵')).toBe(true);
    expect(isDefectAnnotated('3 damaged')).toBe(false);
    expect(isDefectAnnotated(3)).toBe(false);
  });
});
