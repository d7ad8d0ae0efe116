/**
 * constants/index.ts
 * Central export for constants
 */

export { ERROR_MESSAGES } from './error-messages.js';
