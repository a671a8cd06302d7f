import axios, { AxiosInstance } from 'axios';
import type pino from 'pino';
import type { WeatherQuery, WeatherRecord } from '../../types/weather.types.js';
import type { UpstreamFailure } from '../../utils/errors.js';
import { err, ok, type Result } from '../../utils/result.js';
import { isJsonObject } from '../../utils/validators.js';

export const DAILY_WEATHER_VARIABLES = [
  'temperature_2m_max',
  'temperature_2m_min',
  'temperature_2m_mean',
  'apparent_temperature_max',
  'apparent_temperature_min',
  'apparent_temperature_mean',
] as const;

export interface OpenMeteoArchiveConfig {
  archiveUrl: string;
  timeoutMs: number;
}

export interface WeatherArchiveClient {
  fetchDailyTemperatures(query: WeatherQuery): Promise<Result<WeatherRecord, UpstreamFailure>>;
}

/**
 * Adapter for the Open-Meteo historical archive API
 *
 * One GET per call, no retry. Any non-2xx status, transport error or
 * non-object body is reported as an UpstreamFailure.
 */
export class OpenMeteoArchiveAdapter implements WeatherArchiveClient {
  private client: AxiosInstance;

  constructor(
    private readonly config: OpenMeteoArchiveConfig,
    private readonly logger: pino.Logger,
    client?: AxiosInstance,
  ) {
    this.client =
      client ??
      axios.create({
        timeout: config.timeoutMs,
        headers: { Accept: 'application/json' },
      });
  }

  async fetchDailyTemperatures(
    query: WeatherQuery,
  ): Promise<Result<WeatherRecord, UpstreamFailure>> {
    const params = {
      latitude: query.latitude,
      longitude: query.longitude,
      start_date: query.startDate,
      end_date: query.endDate,
      daily: DAILY_WEATHER_VARIABLES.join(','),
      timezone: 'auto',
    };

    this.logger.debug({ params }, 'Fetching daily temperatures from Open-Meteo');

    try {
      const response = await this.client.get<unknown>(this.config.archiveUrl, {
        params,
        timeout: this.config.timeoutMs,
        validateStatus: () => true,
      });

      if (response.status < 200 || response.status >= 300) {
        this.logger.warn(
          { status: response.status, params },
          'Open-Meteo archive request failed',
        );
        return err({
          kind: 'UpstreamFailure',
          detail: `Request failed with status code ${response.status}`,
        });
      }

      if (!isJsonObject(response.data)) {
        this.logger.warn({ params }, 'Open-Meteo archive returned a non-object body');
        return err({ kind: 'UpstreamFailure', detail: 'Response body is not a JSON object' });
      }

      return ok(response.data);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        { error: detail, code: axios.isAxiosError(error) ? error.code : undefined, params },
        'Open-Meteo archive request failed',
      );
      return err({ kind: 'UpstreamFailure', detail });
    }
  }
}
