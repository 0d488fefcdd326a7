// Quality Domain

// Entities
export * from './entities/index.js';

// Repository Interfaces
export * from './repositories/index.js';

// Commands
export * from './commands/index.js';

// Queries
export * from './queries/index.js';

// Services
export * from './services/index.js';
