import { FastifyInstance } from 'fastify';

export const ENDPOINT_DIRECTORY = {
  message: 'Welcome to the Historical Weather Data API 🌤️',
  endpoints: {
    'POST /store-weather-data': 'Fetch and store weather data in object storage',
    'GET /list-weather-files': 'List stored weather data files',
    'GET /weather-file-content/{file_name}': 'Retrieve content of a specific file',
    'GET /health': 'Service and storage status',
    'GET /documentation': 'OpenAPI documentation',
  },
} as const;

export async function rootRoute(app: FastifyInstance): Promise<void> {
  app.get(
    '/',
    {
      schema: {
        tags: ['weather'],
        description: 'List available endpoints',
      },
    },
    async () => ENDPOINT_DIRECTORY,
  );
}
