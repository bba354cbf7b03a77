import axios from 'axios';
import { TransportError, type ServiceName } from '../errors.js';

/**
 * Wrap whatever an HTTP call threw into a TransportError, keeping the status
 * code and response body when the server answered.
 */
export function toTransportError(service: ServiceName, operation: string, error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const message = status !== undefined ? `HTTP ${status}` : error.code ? `${error.code}: ${error.message}` : error.message;
    return new TransportError(service, operation, message, {
      status,
      body: error.response?.data,
      cause: error,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(service, operation, message, { cause: error });
}
