/**
 * Vitest setup file
 * Keeps pipeline logging quiet unless a test run asks for more
 */

process.env.LOG_LEVEL ??= 'error';
