/**
 * Infrastructure Exports
 */

export * from './redis';
