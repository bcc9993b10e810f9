// Central export for all type definitions

// Re-export configuration types
export * from '../config/types.js';

// Re-export credential types
export * from './token.js';

// Re-export secret store types
export * from './secret-store.js';

// Re-export Spotify API types
export * from './spotify.js';
