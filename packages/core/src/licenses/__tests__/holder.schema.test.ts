import {
  countPhoneDigits,
  isValidPhone,
  parseBatchSize,
  parseHolder,
} from '../validation/holder.schema';
import { ValidationError } from '../../errors/base.error';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('holder validation', () => {
  describe('phone numbers', () => {
    it('should count digits only', () => {
      expect(countPhoneDigits('+1 (555) 010-0200')).toBe(11);
    });

    it.each([
      ['5550100', true],
      ['+44 20 7946 0958', true],
      ['123456789012345', true],
      ['555010', false],
      ['1234567890123456', false],
      ['phone', false],
    ])('should judge %p as valid: %p', (phone, expected) => {
      expect(isValidPhone(phone)).toBe(expected);
    });
  });

  describe('parseHolder', () => {
    it('should trim both fields', () => {
      expect(parseHolder({ name: '  Test Holder  ', phone: ' 555-0100-200 ' })).toEqual({
        name: 'Test Holder',
        phone: '555-0100-200',
      });
    });

    it('should report each invalid field', () => {
      const error = captureError(() => parseHolder({ name: '', phone: '12' }));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        message: 'Invalid license holder',
        details: {
          fields: [
            { field: 'name', message: 'Full name cannot be empty' },
            { field: 'phone', message: 'Phone number must contain 7-15 digits' },
          ],
        },
      });
    });

    it('should require both fields', () => {
      expect(captureError(() => parseHolder({ name: 'Test Holder' }))).toMatchObject({
        fields: [{ field: 'phone', message: 'Phone number is required' }],
      });
    });

    it('should reject names longer than 200 characters', () => {
      expect(() => parseHolder({ name: 'N'.repeat(201), phone: '5550100200' })).toThrow(ValidationError);
    });
  });

  describe('parseBatchSize', () => {
    it('should accept integers within bounds', () => {
      expect(parseBatchSize(1, 10)).toBe(1);
      expect(parseBatchSize(10, 10)).toBe(10);
    });

    it.each([
      [0, 'Batch size must be at least 1'],
      [11, 'Batch size must be at most 10'],
      [1.5, 'Batch size must be an integer'],
      ['5', 'Batch size must be a number'],
    ])('should reject %p', (count, message) => {
      expect(captureError(() => parseBatchSize(count, 10))).toMatchObject({
        fields: [{ field: 'count', message }],
      });
    });
  });
});
