import { MongoError, MongoServerError } from 'mongodb';
import { ItemServiceError, UnavailableError, ValidationError } from '../errors';

const DUPLICATE_KEY = 11000;
const DOCUMENT_VALIDATION_FAILURE = 121;

/**
 * Maps driver exceptions onto the service taxonomy. Constraint violations
 * reported by the server become `ValidationError`; every other driver
 * failure (network, server selection, timeouts, closed topology) becomes
 * `UnavailableError`. Anything that did not come from the driver is returned
 * unchanged.
 */
export function translateMongoError(err: unknown, backend = 'mongodb'): unknown {
  if (err instanceof ItemServiceError) return err;

  if (err instanceof MongoServerError) {
    if (err.code === DUPLICATE_KEY) {
      return new ValidationError('duplicate key', [{ path: '', message: 'an item with this key already exists' }], {
        cause: err,
      });
    }
    if (err.code === DOCUMENT_VALIDATION_FAILURE) {
      return new ValidationError('document failed validation', [], { cause: err });
    }
  }

  if (err instanceof MongoError) {
    return new UnavailableError(backend, `database unavailable: ${err.message}`, { cause: err });
  }

  return err;
}
