import { DomainError } from './DomainError';

/**
 * Thrown when a value fails domain validation (phone number, birthday, name)
 */
export class ValidationError extends DomainError {}
