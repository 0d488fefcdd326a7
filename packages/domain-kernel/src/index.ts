export { Entity } from './base-classes/entity.js';
export {
  DomainError,
  errorMessage,
  InvariantViolation,
  NotFoundError,
  ValidationError,
} from './errors/domain-error.js';
export { Result } from './result/result.js';
