/**
 * Central export point for all custom errors
 */
export * from './AppError';
export * from './ValidationError';
export * from './UnauthorizedError';
export * from './NotFoundError';
export * from './ConflictError';
export * from './BusinessRuleError';
