/**
 * sitepush - incremental S3 static website sync
 *
 * Main library exports
 */

// Export types
export * from './types/config.js';
export * from './types/sync.js';

// Export core functionality
export * from './core/errors.js';
export * from './core/config/index.js';
export * from './core/aws/index.js';
export * from './core/sync/index.js';
