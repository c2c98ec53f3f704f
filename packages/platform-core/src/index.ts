/**
 * Platform Core - shared infrastructure for catalog services
 *
 * - Structured logging with correlation tracking
 * - Domain error hierarchy
 * - Environment-driven database configuration
 * - Postgres connection factory
 */

export * from './config/index.js';
export * from './error-handling/index.js';
export * from './logging/index.js';
export * from './database/index.js';
