/**
 * CLI Flag Validation Utilities
 *
 * ```typescript
 * import { validateEnum, validatePositiveNumber } from './validation.js';
 *
 * validateEnum(key, CONFIG_KEYS, 'config key');
 * const seconds = validatePositiveNumber(options.timeout, '--timeout');
 * ```
 */

import chalk from 'chalk';
import { exit } from './exit.js';

/**
 * Validate that a value is one of the allowed options.
 * Exits with an error listing the valid values if not.
 */
export function validateEnum<T extends string>(
    value: string | undefined,
    allowed: readonly T[],
    flagName: string
): value is T | undefined {
    if (value === undefined) {
        return true;
    }

    if (!allowed.some(option => option === value)) {
        console.error(chalk.red('Error:'), `Invalid value for ${flagName}: "${value}"`);
        console.log('Valid values:', allowed.join(', '));
        exit(1);
    }

    return true;
}

/**
 * Validate that a numeric value is a whole number within range.
 *
 * Exits with an error if it is not.
 *
 * @param min - Minimum allowed value (default: 1)
 * @param max - Maximum allowed value (optional)
 * @returns The parsed number, or undefined if not provided
 */
export function validatePositiveNumber(
    value: string | number | undefined,
    flagName: string,
    min = 1,
    max?: number
): number | undefined {
    if (value === undefined) {
        return undefined;
    }

    const num = typeof value === 'string' && /^\s*-?\d+\s*$/.test(value) ? parseInt(value, 10) : Number(value);

    if (!Number.isInteger(num)) {
        console.error(chalk.red('Error:'), `${flagName} must be a whole number`);
        exit(1);
    }

    if (num < min) {
        console.error(chalk.red('Error:'), `${flagName} must be at least ${min}`);
        exit(1);
    }

    if (max !== undefined && num > max) {
        console.error(chalk.red('Error:'), `${flagName} must be at most ${max}`);
        exit(1);
    }

    return num;
}
