import type { WeatherQuery } from '../../types/weather.types.js';

export const STORED_FILE_CONTENT_TYPE = 'application/json';

/**
 * weather_{lat}_{lon}_{start}_{end}_{YYYYMMDDHHMMSS}.json
 */
export const STORED_FILE_NAME_PATTERN =
  /^weather_(-?\d+(?:\.\d+)?(?:e[+-]\d+)?)_(-?\d+(?:\.\d+)?(?:e[+-]\d+)?)_(\d{4}-\d{2}-\d{2})_(\d{4}-\d{2}-\d{2})_(\d{14})\.json$/;

/**
 * UTC timestamp at second resolution, e.g. 20240105142233.
 */
export function formatUtcTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:T]/g, '').slice(0, 14);
}

// String(-0) drops the sign
function formatCoordinate(value: number): string {
  return Object.is(value, -0) ? '-0' : String(value);
}

export function buildStoredFileName(query: WeatherQuery, createdAt: Date): string {
  const timestamp = formatUtcTimestamp(createdAt);
  const latitude = formatCoordinate(query.latitude);
  const longitude = formatCoordinate(query.longitude);
  return `weather_${latitude}_${longitude}_${query.startDate}_${query.endDate}_${timestamp}.json`;
}

export function serializeWeatherRecord(record: unknown): string {
  return JSON.stringify(record, null, 2);
}
