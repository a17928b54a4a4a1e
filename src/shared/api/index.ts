/**
 * Shared API utilities
 */
export {
  createHttpClient,
  HttpError,
  type HttpClient,
  type HttpClientOptions,
  type RequestOptions,
} from './http-client';
