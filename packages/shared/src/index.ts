export * from './constants.js';
export * from './types/user.js';
export * from './types/security.js';
export * from './utils/logger.js';
export * from './utils/crypto.js';
export * from './utils/validation.js';
