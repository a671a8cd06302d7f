import { FastifyInstance } from 'fastify';
import type { WeatherArchiveClient } from '../adapters/open-meteo/open-meteo-archive.adapter.js';
import type { StorageHandle } from '../services/storage/object-store.gateway.js';
import { healthRoute } from './health.route.js';
import { rootRoute } from './root.route.js';
import { storeWeatherDataRoutes } from './weather/store-weather-data.js';
import { weatherFilesRoutes } from './weather/weather-files.routes.js';

export type RouteDependencies = {
  storage: StorageHandle;
  weatherClient: WeatherArchiveClient;
  clock: () => Date;
};

export async function registerRoutes(
  app: FastifyInstance,
  dependencies: RouteDependencies,
): Promise<void> {
  await app.register(rootRoute);
  await app.register(healthRoute, dependencies);

  // Weather archive routes
  await app.register(storeWeatherDataRoutes, dependencies);
  await app.register(weatherFilesRoutes, dependencies);
}
