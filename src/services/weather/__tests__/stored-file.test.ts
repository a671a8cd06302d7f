import { describe, it, expect } from 'vitest';
import {
  STORED_FILE_NAME_PATTERN,
  buildStoredFileName,
  formatUtcTimestamp,
  serializeWeatherRecord,
} from '../stored-file.js';

describe('stored file naming', () => {
  it('should format UTC timestamps at second resolution', () => {
    expect(formatUtcTimestamp(new Date('2024-01-05T03:04:05.678Z'))).toBe('20240105030405');
  });

  it('should use UTC regardless of the offset the date was written in', () => {
    expect(formatUtcTimestamp(new Date('2024-06-30T23:30:00-02:00'))).toBe('20240701013000');
  });

  it('should encode coordinates, dates and timestamp', () => {
    const name = buildStoredFileName(
      { latitude: 52.52, longitude: 13.41, startDate: '2024-01-01', endDate: '2024-01-31' },
      new Date('2024-02-01T12:00:00Z'),
    );

    expect(name).toBe('weather_52.52_13.41_2024-01-01_2024-01-31_20240201120000.json');
    expect(name).toMatch(STORED_FILE_NAME_PATTERN);
  });

  it('should keep signs and integer coordinates as written', () => {
    const name = buildStoredFileName(
      { latitude: -33.87, longitude: 151, startDate: '2023-12-01', endDate: '2023-12-02' },
      new Date('2023-12-03T00:00:09Z'),
    );

    expect(name).toBe('weather_-33.87_151_2023-12-01_2023-12-02_20231203000009.json');
    expect(name).toMatch(STORED_FILE_NAME_PATTERN);
  });

  it('should keep the sign of negative zero', () => {
    const name = buildStoredFileName(
      { latitude: -0, longitude: 0, startDate: '2024-01-01', endDate: '2024-01-02' },
      new Date('2024-01-03T00:00:00Z'),
    );

    expect(name).toBe('weather_-0_0_2024-01-01_2024-01-02_20240103000000.json');
    expect(name).toMatch(STORED_FILE_NAME_PATTERN);
  });

  it('should produce distinct names in different seconds', () => {
    const query = { latitude: 1.5, longitude: 2.5, startDate: '2024-01-01', endDate: '2024-01-02' };

    const first = buildStoredFileName(query, new Date('2024-01-03T10:00:00.900Z'));
    const second = buildStoredFileName(query, new Date('2024-01-03T10:00:01.100Z'));

    expect(first).not.toBe(second);
  });

  it('should collide within the same second', () => {
    const query = { latitude: 1.5, longitude: 2.5, startDate: '2024-01-01', endDate: '2024-01-02' };

    const first = buildStoredFileName(query, new Date('2024-01-03T10:00:00.100Z'));
    const second = buildStoredFileName(query, new Date('2024-01-03T10:00:00.900Z'));

    expect(first).toBe(second);
  });
});

describe('serializeWeatherRecord', () => {
  it('should pretty-print with two-space indentation', () => {
    expect(serializeWeatherRecord({ latitude: 52.5, daily: { time: ['2024-01-01'] } })).toBe(
      '{\n  "latitude": 52.5,\n  "daily": {\n    "time": [\n      "2024-01-01"\n    ]\n  }\n}',
    );
  });
});
