import { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../index.js';
import type { StoreWeatherDataResponse } from '../../types/weather.types.js';
import { sendServiceError } from '../../utils/errors.js';
import { validateWeatherQuery } from '../../utils/validators.js';
import {
  STORED_FILE_CONTENT_TYPE,
  buildStoredFileName,
  serializeWeatherRecord,
} from '../../services/weather/stored-file.js';

export async function storeWeatherDataRoutes(
  app: FastifyInstance,
  { storage, weatherClient, clock }: RouteDependencies,
): Promise<void> {
  app.post(
    '/store-weather-data',
    {
      schema: {
        tags: ['weather'],
        description:
          'Fetch daily temperatures from the Open-Meteo archive and store the raw response. ' +
          'Body: { latitude: number, longitude: number, start_date: "YYYY-MM-DD", end_date: "YYYY-MM-DD" }',
        response: {
          201: {
            type: 'object',
            properties: {
              message: { type: 'string' },
              file_name: { type: 'string' },
            },
          },
        },
      },
    },
    async (request, reply) => {
      if (storage.state === 'unavailable') {
        return sendServiceError(reply, { kind: 'StorageUnavailable' });
      }

      const query = validateWeatherQuery(request.body);
      if (!query.ok) {
        return sendServiceError(reply, query.error);
      }

      const record = await weatherClient.fetchDailyTemperatures(query.value);
      if (!record.ok) {
        return sendServiceError(reply, record.error);
      }

      // Same coordinates and dates within one second map to the same name; last write wins
      const fileName = buildStoredFileName(query.value, clock());
      const written = await storage.gateway.writeBlob(
        fileName,
        serializeWeatherRecord(record.value),
        STORED_FILE_CONTENT_TYPE,
      );
      if (!written.ok) {
        return sendServiceError(reply, written.error);
      }

      const response: StoreWeatherDataResponse = {
        message: 'Weather data stored successfully',
        file_name: fileName,
      };
      return reply.status(201).send(response);
    },
  );
}
