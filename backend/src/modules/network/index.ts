/**
 * Network layer: axios clients, per-provider pacing, error mapping.
 */

export * from './httpClient.factory.js';
export * from './rateLimiter.js';
export * from './http.errors.js';
