/**
 * Validated request for one archive lookup.
 * Dates are calendar dates in YYYY-MM-DD form.
 */
export interface WeatherQuery {
  latitude: number;
  longitude: number;
  startDate: string;
  endDate: string;
}

/**
 * Raw Open-Meteo archive response. Stored verbatim, never inspected.
 */
export type WeatherRecord = Record<string, unknown>;

export interface StoreWeatherDataResponse {
  message: string;
  file_name: string;
}
