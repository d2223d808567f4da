// Types
export * from './types/index.js';

// Zod schemas
export * from './schemas/index.js';

// Validation (AJV)
export * from './validation/index.js';

// Constants
export * from './utils/index.js';
