/**
 * Floor Plan Search
 *
 * Main entry point for the library
 */

// Export geometry types
export * from './types/geometry';

// Export geometry utilities
export * from './geometry';

// Export the layout search engine
export * from './algorithm';

// Version info
export const VERSION = '0.1.0';
export const NAME = 'Floor Plan Search';
