/**
 * Tool argument validation
 */

import { describe, it, expect } from '@jest/globals';
import { ValidationUtils } from '../src/utils/validation-utils';
import { ErrorCategory } from '../src/core/error-handler';

describe('ValidationUtils', () => {
  describe('validateArguments', () => {
    it('treats missing arguments as empty', () => {
      expect(ValidationUtils.validateArguments(undefined)).toEqual({});
    });

    it('copies a plain object', () => {
      const args = { station: 'UT' };
      const validated = ValidationUtils.validateArguments(args);
      expect(validated).toEqual({ station: 'UT' });
      expect(validated).not.toBe(args);
    });

    it('rejects null, primitives and arrays', () => {
      expect(() => ValidationUtils.validateArguments(null)).toThrow('Invalid arguments: expected object');
      expect(() => ValidationUtils.validateArguments('UT')).toThrow('Invalid arguments: expected object');
      expect(() => ValidationUtils.validateArguments(42)).toThrow('Invalid arguments: expected object');
      expect(() => ValidationUtils.validateArguments(['UT'])).toThrow('Invalid arguments: expected object, got array');
    });

    it('raises validation errors', () => {
      expect(() => ValidationUtils.validateArguments(null)).toThrow(
        expect.objectContaining({ category: ErrorCategory.VALIDATION })
      );
    });
  });

  describe('sanitizeInput', () => {
    it('replaces control characters and collapses whitespace', () => {
      expect(ValidationUtils.sanitizeInput('  Utrecht\u0000  Centraal\n')).toBe('Utrecht Centraal');
      expect(ValidationUtils.sanitizeInput('\t\r\n')).toBe('');
    });
  });

  describe('strings', () => {
    it('returns the sanitized value', () => {
      expect(ValidationUtils.requireString({ name: '  Ada  ' }, 'name')).toBe('Ada');
    });

    it('rejects missing, blank and non-string values', () => {
      expect(() => ValidationUtils.requireString({}, 'name')).toThrow('Invalid name: must be a non-empty string');
      expect(() => ValidationUtils.requireString({ name: '   ' }, 'name')).toThrow('Invalid name: must be a non-empty string');
      expect(() => ValidationUtils.requireString({ name: 42 }, 'name')).toThrow('Invalid name: must be a string');
    });

    it('enforces the length limit', () => {
      expect(() => ValidationUtils.requireString({ name: 'x'.repeat(501) }, 'name'))
        .toThrow('Invalid name: exceeds maximum length of 500 characters');
      expect(ValidationUtils.requireString({ text: 'x'.repeat(800) }, 'text', 1000)).toHaveLength(800);
    });

    it('treats null and blank optional strings as absent', () => {
      expect(ValidationUtils.optionalString({ via: null }, 'via')).toBeUndefined();
      expect(ValidationUtils.optionalString({ via: ' ' }, 'via')).toBeUndefined();
      expect(ValidationUtils.optionalString({ via: 'GD' }, 'via')).toBe('GD');
    });
  });

  describe('numbers', () => {
    it('accepts numbers and numeric strings within range', () => {
      expect(ValidationUtils.requireNumber({ latitude: 52.1 }, 'latitude', -90, 90)).toBe(52.1);
      expect(ValidationUtils.requireNumber({ latitude: ' -33.9 ' }, 'latitude', -90, 90)).toBe(-33.9);
      expect(ValidationUtils.requireNumber({ latitude: 90 }, 'latitude', -90, 90)).toBe(90);
    });

    it('rejects missing, non-numeric and out of range values', () => {
      expect(() => ValidationUtils.requireNumber({}, 'latitude', -90, 90)).toThrow('Invalid latitude: a number is required');
      expect(() => ValidationUtils.requireNumber({ latitude: '' }, 'latitude', -90, 90)).toThrow('Invalid latitude: a number is required');
      expect(() => ValidationUtils.requireNumber({ latitude: 'north' }, 'latitude', -90, 90)).toThrow('Invalid latitude: must be a number');
      expect(() => ValidationUtils.requireNumber({ latitude: Number.NaN }, 'latitude', -90, 90)).toThrow('Invalid latitude: must be a number');
      expect(() => ValidationUtils.requireNumber({ latitude: true }, 'latitude', -90, 90)).toThrow('Invalid latitude: must be a number');
      expect(() => ValidationUtils.requireNumber({ latitude: 91 }, 'latitude', -90, 90)).toThrow('Invalid latitude: must be between -90 and 90');
    });

    it('requires whole numbers for integers', () => {
      expect(ValidationUtils.optionalInteger({ limit: '10' }, 'limit', 1, 100)).toBe(10);
      expect(ValidationUtils.optionalInteger({}, 'limit', 1, 100)).toBeUndefined();
      expect(() => ValidationUtils.optionalInteger({ limit: 2.5 }, 'limit', 1, 100)).toThrow('Invalid limit: must be a whole number');
    });
  });

  describe('booleans', () => {
    it('accepts booleans and their string forms', () => {
      expect(ValidationUtils.optionalBoolean({ flag: true }, 'flag')).toBe(true);
      expect(ValidationUtils.optionalBoolean({ flag: 'false' }, 'flag')).toBe(false);
      expect(ValidationUtils.optionalBoolean({}, 'flag')).toBeUndefined();
      expect(() => ValidationUtils.optionalBoolean({ flag: 'yes' }, 'flag')).toThrow('Invalid flag: must be true or false');
    });
  });

  describe('dates', () => {
    it('validates calendar dates', () => {
      expect(ValidationUtils.optionalDate({ date: '2024-02-29' }, 'date')).toBe('2024-02-29');
      expect(() => ValidationUtils.optionalDate({ date: '2023-02-29' }, 'date'))
        .toThrow('Invalid date: expected a date in YYYY-MM-DD format');
      expect(() => ValidationUtils.optionalDate({ date: '01-05-2024' }, 'date'))
        .toThrow('Invalid date: expected a date in YYYY-MM-DD format');
    });

    it('validates ISO date-times', () => {
      expect(ValidationUtils.optionalDateTime({ dateTime: '2024-05-01T08:30' }, 'dateTime')).toBe('2024-05-01T08:30');
      expect(ValidationUtils.optionalDateTime({ dateTime: '2024-05-01T08:30:00+02:00' }, 'dateTime')).toBe('2024-05-01T08:30:00+02:00');
      expect(() => ValidationUtils.optionalDateTime({ dateTime: '2024-05-01 08:30' }, 'dateTime'))
        .toThrow('Invalid dateTime: expected an ISO 8601 date-time such as 2024-05-01T08:30');
    });
  });

  describe('codes', () => {
    const FLIGHT = /^[A-Z0-9]{2}\d{1,4}[A-Z]?$/;

    it('strips spaces and upper-cases', () => {
      expect(ValidationUtils.requireCode({ flight_iata: 'kl 601' }, 'flight_iata', FLIGHT, 'KL601')).toBe('KL601');
    });

    it('rejects codes that do not fit the pattern', () => {
      expect(() => ValidationUtils.requireCode({ flight_iata: 'K' }, 'flight_iata', FLIGHT, 'KL601'))
        .toThrow('Invalid flight_iata: expected a code like "KL601"');
    });

    it('leaves an absent optional code undefined', () => {
      expect(ValidationUtils.optionalCode({}, 'dep_iata', /^[A-Z]{3}$/, 'AMS')).toBeUndefined();
      expect(ValidationUtils.optionalCode({ dep_iata: 'ams' }, 'dep_iata', /^[A-Z]{3}$/, 'AMS')).toBe('AMS');
    });
  });
});
