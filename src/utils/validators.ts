import { z } from 'zod';
import type { WeatherQuery } from '../types/weather.types.js';
import type { ValidationFailure } from './errors.js';
import { err, ok, type Result } from './result.js';

const REQUIRED_FIELDS = ['latitude', 'longitude', 'start_date', 'end_date'] as const;

const payloadSchema = z.record(z.string(), z.unknown());

const coordinateSchema = z.number().finite();

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) {
    return false;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return false;
  }

  // setUTCFullYear keeps years below 100 as-is, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

const isoDateSchema = z.string().refine(isCalendarDate);

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return payloadSchema.safeParse(value).success;
}

/**
 * Turns a parsed request body into a WeatherQuery.
 *
 * Checks run in a fixed order and the first failing one wins: object shape,
 * field presence, coordinate types, date format. Date ordering and coordinate
 * ranges are deliberately left to the upstream provider.
 */
export function validateWeatherQuery(body: unknown): Result<WeatherQuery, ValidationFailure> {
  const payload = payloadSchema.safeParse(body);
  if (!payload.success) {
    return err({ kind: 'MalformedPayload' });
  }

  const fields = payload.data;
  if (REQUIRED_FIELDS.some((field) => fields[field] === undefined || fields[field] === null)) {
    return err({ kind: 'MissingFields' });
  }

  const latitude = coordinateSchema.safeParse(fields.latitude);
  const longitude = coordinateSchema.safeParse(fields.longitude);
  if (!latitude.success || !longitude.success) {
    return err({ kind: 'InvalidType' });
  }

  const startDate = isoDateSchema.safeParse(fields.start_date);
  const endDate = isoDateSchema.safeParse(fields.end_date);
  if (!startDate.success || !endDate.success) {
    return err({ kind: 'InvalidDateFormat' });
  }

  return ok({
    latitude: latitude.data,
    longitude: longitude.data,
    startDate: startDate.data,
    endDate: endDate.data,
  });
}
