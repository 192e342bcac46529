/**
 * Validation Utilities
 * Typed extraction and sanitization of MCP tool arguments
 */

import { ErrorCategory, ToolError } from '../core/error-handler.js';
import { TimeUtils } from './time-utils.js';
import type { ToolArguments } from '../types/mcp.types.js';

export const VALIDATION_LIMITS = {
  MAX_STRING_LENGTH: 500,
  MAX_TODO_LENGTH: 1000,
} as const;

function invalid(message: string, field: string, value?: unknown): ToolError {
  return new ToolError(ErrorCategory.VALIDATION, message, { field, providedType: typeof value });
}

export class ValidationUtils {
  /**
   * Arguments must be a plain object; absent arguments count as empty
   */
  static validateArguments(args: unknown): ToolArguments {
    if (args === undefined) return {};
    if (typeof args !== 'object' || args === null) {
      throw invalid('Invalid arguments: expected object', 'arguments', args);
    }
    if (Array.isArray(args)) {
      throw invalid('Invalid arguments: expected object, got array', 'arguments', args);
    }
    return Object.fromEntries(Object.entries(args));
  }

  /**
   * Strip control characters and collapse whitespace
   */
  static sanitizeInput(input: string): string {
    return input
      .replace(/[\u0000-\u001F\u007F-\u009F]/g, ' ')
      .replace(/\s+/g, ' ')
      .trim();
  }

  static requireString(
    args: ToolArguments,
    field: string,
    maxLength: number = VALIDATION_LIMITS.MAX_STRING_LENGTH
  ): string {
    const value = ValidationUtils.optionalString(args, field, maxLength);
    if (value === undefined) {
      throw invalid(`Invalid ${field}: must be a non-empty string`, field, args[field]);
    }
    return value;
  }

  static optionalString(
    args: ToolArguments,
    field: string,
    maxLength: number = VALIDATION_LIMITS.MAX_STRING_LENGTH
  ): string | undefined {
    const value = args[field];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
      throw invalid(`Invalid ${field}: must be a string`, field, value);
    }

    const sanitized = ValidationUtils.sanitizeInput(value);
    if (sanitized.length > maxLength) {
      throw invalid(`Invalid ${field}: exceeds maximum length of ${maxLength} characters`, field, value);
    }
    return sanitized || undefined;
  }

  /**
   * Finite number within [min, max]; numeric strings are accepted
   */
  static requireNumber(args: ToolArguments, field: string, min: number, max: number): number {
    const value = ValidationUtils.optionalNumber(args, field, min, max);
    if (value === undefined) {
      throw invalid(`Invalid ${field}: a number is required`, field, args[field]);
    }
    return value;
  }

  static optionalNumber(args: ToolArguments, field: string, min: number, max: number): number | undefined {
    const raw = args[field];
    if (raw === undefined || raw === null || raw === '') return undefined;

    const value = typeof raw === 'string' ? Number(raw.trim()) : raw;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw invalid(`Invalid ${field}: must be a number`, field, raw);
    }
    if (value < min || value > max) {
      throw invalid(`Invalid ${field}: must be between ${min} and ${max}`, field, raw);
    }
    return value;
  }

  static optionalInteger(args: ToolArguments, field: string, min: number, max: number): number | undefined {
    const value = ValidationUtils.optionalNumber(args, field, min, max);
    if (value !== undefined && !Number.isInteger(value)) {
      throw invalid(`Invalid ${field}: must be a whole number`, field, args[field]);
    }
    return value;
  }

  static optionalBoolean(args: ToolArguments, field: string): boolean | undefined {
    const value = args[field];
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'boolean') return value;
    if (value === 'true') return true;
    if (value === 'false') return false;
    throw invalid(`Invalid ${field}: must be true or false`, field, value);
  }

  static optionalDate(args: ToolArguments, field: string): string | undefined {
    const value = ValidationUtils.optionalString(args, field);
    if (value !== undefined && !TimeUtils.isValidDate(value)) {
      throw invalid(`Invalid ${field}: expected a date in YYYY-MM-DD format`, field, value);
    }
    return value;
  }

  static optionalDateTime(args: ToolArguments, field: string): string | undefined {
    const value = ValidationUtils.optionalString(args, field);
    if (value !== undefined && !TimeUtils.isValidDateTime(value)) {
      throw invalid(`Invalid ${field}: expected an ISO 8601 date-time such as 2024-05-01T08:30`, field, value);
    }
    return value;
  }

  /**
   * Upper-cased code matching `pattern`, e.g. an IATA airport or flight code
   */
  static requireCode(args: ToolArguments, field: string, pattern: RegExp, example: string): string {
    const value = ValidationUtils.requireString(args, field, 16).replace(/\s+/g, '').toUpperCase();
    if (!pattern.test(value)) {
      throw invalid(`Invalid ${field}: expected a code like "${example}"`, field, value);
    }
    return value;
  }

  static optionalCode(args: ToolArguments, field: string, pattern: RegExp, example: string): string | undefined {
    if (ValidationUtils.optionalString(args, field) === undefined) return undefined;
    return ValidationUtils.requireCode(args, field, pattern, example);
  }
}
