/**
 * Error Module
 * Exports all domain error types and utilities.
 */

export {
  DomainError,
  InputError,
  ConfigurationError,
  ClassifierUnavailableError,
  isDomainError,
  wrapError,
} from './DomainError';

export type {
  DomainErrorContext,
  ErrorCode,
  ConfigurationIssue,
  ClassifierFailureReason,
} from './DomainError';
