import { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../index.js';
import { sendServiceError } from '../../utils/errors.js';

export async function weatherFilesRoutes(
  app: FastifyInstance,
  { storage }: RouteDependencies,
): Promise<void> {
  // List stored files, in backend order
  app.get(
    '/list-weather-files',
    {
      schema: {
        tags: ['weather'],
        description: 'List stored weather data files',
      },
    },
    async (_request, reply) => {
      if (storage.state === 'unavailable') {
        return sendServiceError(reply, { kind: 'StorageUnavailable' });
      }

      const names = await storage.gateway.listBlobs();
      if (!names.ok) {
        return sendServiceError(reply, names.error);
      }

      return reply.send(names.value);
    },
  );

  // Get the stored JSON document
  app.get<{
    Params: { file_name: string };
  }>(
    '/weather-file-content/:file_name',
    {
      schema: {
        tags: ['weather'],
        description: 'Retrieve content of a specific stored file',
        params: {
          type: 'object',
          properties: {
            file_name: { type: 'string' },
          },
          required: ['file_name'],
        },
      },
    },
    async (request, reply) => {
      if (storage.state === 'unavailable') {
        return sendServiceError(reply, { kind: 'StorageUnavailable' });
      }

      const { file_name: fileName } = request.params;
      const blob = await storage.gateway.readBlob(fileName);
      if (!blob.ok) {
        return sendServiceError(reply, blob.error);
      }

      let document: unknown;
      try {
        document = JSON.parse(blob.value.toString('utf-8'));
      } catch (error) {
        request.log.error({ err: error, fileName }, 'Stored file is not valid JSON');
        return sendServiceError(reply, {
          kind: 'StorageFailure',
          operation: 'read',
          detail: error instanceof Error ? error.message : String(error),
        });
      }

      return reply.type('application/json; charset=utf-8').send(JSON.stringify(document));
    },
  );
}
