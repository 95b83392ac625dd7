/**
 * Validation utility functions
 * Provides helper functions for validating input parameters
 */

import { ValidationError } from './error-handler';

/**
 * Validate a number value
 * @param value Value to validate
 * @param name Name of the parameter (for error messages)
 * @param options Validation options
 * @returns The validated number
 * @throws ValidationError if validation fails
 */
export function validateNumber(
  value: unknown,
  name: string,
  options: {
    min?: number;
    max?: number;
    integer?: boolean
  } = {}
): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new ValidationError(`Invalid ${name}: must be a number`, { name, value });
  }

  if (options.min !== undefined && value < options.min) {
    throw new ValidationError(`Invalid ${name}: must be at least ${options.min}`, { name, value });
  }

  if (options.max !== undefined && value > options.max) {
    throw new ValidationError(`Invalid ${name}: must be at most ${options.max}`, { name, value });
  }

  if (options.integer && !Number.isInteger(value)) {
    throw new ValidationError(`Invalid ${name}: must be an integer`, { name, value });
  }

  return value;
}

/**
 * Validate a boolean value
 * @throws ValidationError if validation fails
 */
export function validateBoolean(value: unknown, name: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ValidationError(`Invalid ${name}: must be a boolean`, { name, value });
  }

  return value;
}

/**
 * Validate a string value
 * @param value Value to validate
 * @param name Name of the parameter (for error messages)
 * @param options Validation options
 * @returns The validated string
 * @throws ValidationError if validation fails
 */
export function validateString(
  value: unknown,
  name: string,
  options: {
    minLength?: number;
    maxLength?: number;
    pattern?: RegExp
  } = {}
): string {
  if (typeof value !== 'string') {
    throw new ValidationError(`Invalid ${name}: must be a string`, { name });
  }

  if (options.minLength !== undefined && value.length < options.minLength) {
    throw new ValidationError(`Invalid ${name}: must be at least ${options.minLength} characters`, { name });
  }

  if (options.maxLength !== undefined && value.length > options.maxLength) {
    throw new ValidationError(`Invalid ${name}: must be at most ${options.maxLength} characters`, { name });
  }

  if (options.pattern !== undefined && !options.pattern.test(value)) {
    throw new ValidationError(`Invalid ${name}: does not match required pattern`, { name });
  }

  return value;
}

/**
 * Validate that a value is one of a fixed set of choices
 * @throws ValidationError if validation fails
 */
export function validateOneOf<T extends string>(value: unknown, name: string, choices: readonly T[]): T {
  const match = choices.find(choice => choice === value);
  if (match === undefined) {
    throw new ValidationError(`Invalid ${name}: must be one of ${choices.join(', ')}`, { name, value });
  }
  return match;
}
