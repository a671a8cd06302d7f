import type { FastifyReply } from 'fastify';

export type ValidationFailure =
  | { kind: 'MalformedPayload' }
  | { kind: 'MissingFields' }
  | { kind: 'InvalidType' }
  | { kind: 'InvalidDateFormat' };

export interface UpstreamFailure {
  kind: 'UpstreamFailure';
  detail: string;
}

export interface StorageUnavailable {
  kind: 'StorageUnavailable';
}

export type StorageOperation = 'write' | 'list' | 'read';

export interface StorageFailure {
  kind: 'StorageFailure';
  operation: StorageOperation;
  detail: string;
}

export interface NotFound {
  kind: 'NotFound';
}

export type ServiceError =
  | ValidationFailure
  | UpstreamFailure
  | StorageUnavailable
  | StorageFailure
  | NotFound;

export interface ErrorBody {
  error: string;
}

const STORAGE_FAILURE_MESSAGES: Record<StorageOperation, string> = {
  write: 'Failed to store data in object storage',
  list: 'Failed to list files from object storage',
  read: 'Failed to retrieve file content from object storage',
};

function assertNever(value: never): never {
  throw new Error(`Unhandled service error: ${JSON.stringify(value)}`);
}

export function errorStatusCode(error: ServiceError): number {
  switch (error.kind) {
    case 'MalformedPayload':
    case 'MissingFields':
    case 'InvalidType':
    case 'InvalidDateFormat':
      return 400;
    case 'NotFound':
      return 404;
    case 'StorageUnavailable':
    case 'StorageFailure':
      return 500;
    case 'UpstreamFailure':
      return 502;
    default:
      return assertNever(error);
  }
}

export function errorMessage(error: ServiceError): string {
  switch (error.kind) {
    case 'MalformedPayload':
      return 'Invalid JSON payload';
    case 'MissingFields':
      return 'Missing required fields: latitude, longitude, start_date, end_date';
    case 'InvalidType':
      return 'Latitude and longitude must be numbers';
    case 'InvalidDateFormat':
      return 'Dates must be in YYYY-MM-DD format';
    case 'UpstreamFailure':
      return `Failed to fetch data from Open-Meteo: ${error.detail}`;
    case 'StorageUnavailable':
      return 'Object storage is not configured properly.';
    case 'StorageFailure':
      return STORAGE_FAILURE_MESSAGES[error.operation];
    case 'NotFound':
      return 'File not found';
    default:
      return assertNever(error);
  }
}

export function sendServiceError(reply: FastifyReply, error: ServiceError): FastifyReply {
  const body: ErrorBody = { error: errorMessage(error) };
  return reply.status(errorStatusCode(error)).send(body);
}
