export * from './database-config.js';
