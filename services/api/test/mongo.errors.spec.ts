import { describe, expect, it } from 'vitest';
import { MongoNetworkError, MongoNotConnectedError, MongoServerError } from 'mongodb';
import { NotFoundError, UnavailableError, ValidationError } from '../src/errors';
import { translateMongoError } from '../src/mongo/errors';

describe('translateMongoError', () => {
  it('maps duplicate keys to a validation error', () => {
    const driverErr = new MongoServerError({ message: 'E11000 duplicate key error', code: 11000 });
    const err = translateMongoError(driverErr);

    expect(err).toBeInstanceOf(ValidationError);
    if (err instanceof ValidationError) {
      expect(err.message).toBe('duplicate key');
      expect(err.issues).toEqual([{ path: '', message: 'an item with this key already exists' }]);
      expect(err.cause).toBe(driverErr);
    }
  });

  it('maps document validation failures to a validation error', () => {
    const err = translateMongoError(new MongoServerError({ message: 'Document failed validation', code: 121 }));

    expect(err).toBeInstanceOf(ValidationError);
    if (err instanceof ValidationError) expect(err.message).toBe('document failed validation');
  });

  it('maps other server errors to unavailable', () => {
    const err = translateMongoError(new MongoServerError({ message: 'not primary', code: 10107 }));

    expect(err).toBeInstanceOf(UnavailableError);
    if (err instanceof UnavailableError) {
      expect(err.backend).toBe('mongodb');
      expect(err.message).toBe('database unavailable: not primary');
    }
  });

  it('maps network and topology errors to unavailable', () => {
    expect(translateMongoError(new MongoNetworkError('connection reset'))).toBeInstanceOf(UnavailableError);
    expect(translateMongoError(new MongoNotConnectedError('client closed'), 'db')).toMatchObject({
      name: 'UnavailableError',
      backend: 'db',
    });
  });

  it('passes domain errors and non-driver errors through unchanged', () => {
    const notFound = new NotFoundError('Item', 'x');
    const typeErr = new TypeError('bug');

    expect(translateMongoError(notFound)).toBe(notFound);
    expect(translateMongoError(typeErr)).toBe(typeErr);
  });
});
