export * from './places-api.js';
