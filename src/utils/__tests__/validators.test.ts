import { describe, it, expect } from 'vitest';
import { isCalendarDate, isJsonObject, validateWeatherQuery } from '../validators.js';

const validBody = {
  latitude: 52.52,
  longitude: 13.41,
  start_date: '2024-01-01',
  end_date: '2024-01-31',
};

describe('validateWeatherQuery', () => {
  it('should build a query from a valid body', () => {
    const result = validateWeatherQuery(validBody);

    expect(result).toEqual({
      ok: true,
      value: {
        latitude: 52.52,
        longitude: 13.41,
        startDate: '2024-01-01',
        endDate: '2024-01-31',
      },
    });
  });

  it('should ignore unknown fields', () => {
    const result = validateWeatherQuery({ ...validBody, units: 'metric' });
    expect(result.ok).toBe(true);
  });

  describe('payload shape', () => {
    it('should reject bodies that are not JSON objects', () => {
      for (const body of [undefined, null, 'text', 42, true, [validBody]]) {
        expect(validateWeatherQuery(body)).toEqual({
          ok: false,
          error: { kind: 'MalformedPayload' },
        });
      }
    });

    it('should treat an empty object as missing fields', () => {
      expect(validateWeatherQuery({})).toEqual({ ok: false, error: { kind: 'MissingFields' } });
    });
  });

  describe('field presence', () => {
    it('should reject a body missing any required field', () => {
      for (const field of ['latitude', 'longitude', 'start_date', 'end_date']) {
        const body: Record<string, unknown> = { ...validBody };
        delete body[field];

        expect(validateWeatherQuery(body)).toEqual({ ok: false, error: { kind: 'MissingFields' } });
      }
    });

    it('should reject null fields', () => {
      const result = validateWeatherQuery({ ...validBody, end_date: null });
      expect(result).toEqual({ ok: false, error: { kind: 'MissingFields' } });
    });

    it('should accept zero coordinates', () => {
      const result = validateWeatherQuery({ ...validBody, latitude: 0, longitude: 0 });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.latitude).toBe(0);
        expect(result.value.longitude).toBe(0);
      }
    });
  });

  describe('coordinate types', () => {
    it('should reject non-numeric coordinates', () => {
      for (const latitude of ['52.52', true, { value: 52.52 }, [52.52]]) {
        expect(validateWeatherQuery({ ...validBody, latitude })).toEqual({
          ok: false,
          error: { kind: 'InvalidType' },
        });
      }
    });

    it('should check coordinate types before dates', () => {
      const result = validateWeatherQuery({ ...validBody, longitude: 'east', start_date: 'bad' });
      expect(result).toEqual({ ok: false, error: { kind: 'InvalidType' } });
    });

    it('should accept integers and negative values', () => {
      const result = validateWeatherQuery({ ...validBody, latitude: -33, longitude: 151.2093 });
      expect(result.ok).toBe(true);
    });
  });

  describe('date format', () => {
    it('should reject dates outside YYYY-MM-DD', () => {
      for (const startDate of ['2024-13-40', 'Jan 1 2024', '2024-1-05', '2024/01/05', 20240105]) {
        expect(validateWeatherQuery({ ...validBody, start_date: startDate })).toEqual({
          ok: false,
          error: { kind: 'InvalidDateFormat' },
        });
      }
    });

    it('should reject an invalid end date', () => {
      const result = validateWeatherQuery({ ...validBody, end_date: '2023-02-29' });
      expect(result).toEqual({ ok: false, error: { kind: 'InvalidDateFormat' } });
    });

    it('should not require start_date to precede end_date', () => {
      const result = validateWeatherQuery({
        ...validBody,
        start_date: '2024-02-01',
        end_date: '2024-01-01',
      });
      expect(result.ok).toBe(true);
    });
  });
});

describe('isCalendarDate', () => {
  it('should accept real calendar dates', () => {
    expect(isCalendarDate('2024-02-29')).toBe(true);
    expect(isCalendarDate('1999-12-31')).toBe(true);
    expect(isCalendarDate('0001-01-01')).toBe(true);
  });

  it('should reject impossible dates', () => {
    expect(isCalendarDate('2023-02-29')).toBe(false);
    expect(isCalendarDate('2024-04-31')).toBe(false);
    expect(isCalendarDate('2024-00-10')).toBe(false);
    expect(isCalendarDate('2024-01-00')).toBe(false);
    expect(isCalendarDate('0000-01-01')).toBe(false);
  });

  it('should reject surrounding text', () => {
    expect(isCalendarDate(' 2024-01-01')).toBe(false);
    expect(isCalendarDate('2024-01-01T00:00:00Z')).toBe(false);
  });
});

describe('isJsonObject', () => {
  it('should accept plain objects only', () => {
    expect(isJsonObject({ a: 1 })).toBe(true);
    expect(isJsonObject({})).toBe(true);
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
    expect(isJsonObject('{}')).toBe(false);
  });
});
