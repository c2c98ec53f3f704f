export * from './DatabaseConnectionFactory.js';
