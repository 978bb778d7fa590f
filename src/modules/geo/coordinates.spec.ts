import { Coordinates, parseNumber } from './coordinates';

describe('Coordinates', () => {
  it('parses a lat,lon pair and round-trips through toString', () => {
    const result = Coordinates.parse('51.5074,-0.1278');
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.latitude).toBe(51.5074);
    expect(result.value.longitude).toBe(-0.1278);
    expect(result.value.toString()).toBe('51.5074,-0.1278');
  });

  it('round-trips values at the edges of the valid range', () => {
    for (const input of ['90,180', '-90,-180', '0,0', '-33.8688,151.2093']) {
      const result = Coordinates.parse(input);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.toString()).toBe(input);
      }
    }
  });

  it('trims whitespace around the values', () => {
    const result = Coordinates.parse(' 40.7128 , -74.006 ');
    expect(result.ok && result.value.toString()).toBe('40.7128,-74.006');
  });

  it.each([
    ['51.5074', 'INVALID_COORDINATE_FORMAT'],
    ['1,2,3', 'INVALID_COORDINATE_FORMAT'],
    ['abc,10', 'INVALID_LATITUDE'],
    [',10', 'INVALID_LATITUDE'],
    ['10,0x10', 'INVALID_LONGITUDE'],
    ['10,Infinity', 'INVALID_LONGITUDE'],
    ['90.0001,0', 'LATITUDE_OUT_OF_RANGE'],
    ['-91,0', 'LATITUDE_OUT_OF_RANGE'],
    ['0,180.5', 'LONGITUDE_OUT_OF_RANGE'],
    ['0,-181', 'LONGITUDE_OUT_OF_RANGE'],
  ])('rejects %p with %s', (input, reason) => {
    const result = Coordinates.parse(input);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.reason).toBe(reason);
    }
  });

  it('compares by value', () => {
    const a = Coordinates.of(48.8566, 2.3522);
    const b = Coordinates.parse('48.8566,2.3522');
    expect(a.ok && b.ok && a.value.equals(b.value)).toBe(true);

    const c = Coordinates.of(48.8566, 2.3523);
    expect(a.ok && c.ok && a.value.equals(c.value)).toBe(false);
  });

  it('rejects non-finite numbers in the factory', () => {
    const result = Coordinates.of(Number.NaN, 0);
    expect(result.ok).toBe(false);
  });

  describe('parseMultiple', () => {
    it('splits a flat list into pairs in input order', () => {
      const result = Coordinates.parseMultiple(
        '51.5074,-0.1278,48.8566,2.3522',
      );
      expect(result.ok).toBe(true);
      if (!result.ok) return;

      expect(result.value.map((c) => c.toString())).toEqual([
        '51.5074,-0.1278',
        '48.8566,2.3522',
      ]);
    });

    it('ignores blank tokens', () => {
      const result = Coordinates.parseMultiple('51.5074, -0.1278,,');
      expect(result.ok && result.value).toHaveLength(1);
    });

    it('fails on an odd number of values', () => {
      const result = Coordinates.parseMultiple('51.5074');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.failure.reason).toBe('UNPAIRED_COORDINATE');
      }
    });

    it('fails when no pairs remain', () => {
      const result = Coordinates.parseMultiple(' , ');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.failure.reason).toBe('COORDINATE_PAIRS_REQUIRED');
      }
    });

    it('reports the first invalid pair', () => {
      const result = Coordinates.parseMultiple('10,10,95,10');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.failure.reason).toBe('LATITUDE_OUT_OF_RANGE');
      }
    });
  });
});

describe('parseNumber', () => {
  it('accepts decimal and exponent notation', () => {
    expect(parseNumber('-12.5')).toBe(-12.5);
    expect(parseNumber('1e2')).toBe(100);
    expect(parseNumber('.5')).toBe(0.5);
  });

  it('rejects blanks and non-decimal literals', () => {
    expect(parseNumber('')).toBeNull();
    expect(parseNumber('  ')).toBeNull();
    expect(parseNumber('0b11')).toBeNull();
    expect(parseNumber('12abc')).toBeNull();
  });
});
