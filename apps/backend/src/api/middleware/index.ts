/**
 * Middleware Exports
 */

export * from './errorHandler';
export * from './validation';
