import {
  CollisionExhaustedError,
  ConfigurationError,
  PersistenceError,
  RenderError,
  ValidationError,
  extractErrorDetails,
  isOperationalError,
} from '../index';

describe('errors', () => {
  describe('BaseError', () => {
    it('should carry code, name and details', () => {
      const error = new CollisionExhaustedError(10);

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('CollisionExhaustedError');
      expect(error.code).toBe('COLLISION_EXHAUSTED');
      expect(error.details).toEqual({ attempts: 10 });
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it('should keep the underlying cause', () => {
      const cause = new Error('SQLITE_BUSY');
      const error = new PersistenceError('Failed to persist licenses', 'write_failed', cause, {
        batchSize: 3,
      });

      expect(error.cause).toBe(cause);
      expect(error.reason).toBe('write_failed');
      expect(error.details).toEqual({ reason: 'write_failed', batchSize: 3 });
    });

    it('should serialise to JSON without the stack outside development', () => {
      const json = new RenderError('Failed to encode license key as QR code').toJSON();

      expect(json).toMatchObject({
        name: 'RenderError',
        message: 'Failed to encode license key as QR code',
        code: 'RENDER_ERROR',
      });
      expect(json).not.toHaveProperty('stack');
    });
  });

  describe('isOperationalError', () => {
    it('should separate expected failures from programming faults', () => {
      expect(isOperationalError(new ValidationError('Invalid batch size'))).toBe(true);
      expect(isOperationalError(new ConfigurationError('bad config'))).toBe(false);
      expect(isOperationalError(new Error('plain'))).toBe(false);
    });
  });

  describe('extractErrorDetails', () => {
    it('should describe any thrown value', () => {
      expect(extractErrorDetails(new ValidationError('Invalid batch size'))).toMatchObject({
        code: 'VALIDATION_ERROR',
        details: { fields: [] },
      });
      expect(extractErrorDetails(new Error('plain'))).toMatchObject({ name: 'Error', message: 'plain' });
      expect(extractErrorDetails(undefined)).toEqual({ error: 'undefined' });
    });
  });
});
