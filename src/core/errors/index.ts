export {
  AbTestError,
  ErrorCode,
  ValidationError,
  DegenerateVarianceError,
  DomainError,
  UndefinedMssError,
  ConvergenceError,
  isAbTestError,
  wrapError,
} from './AbTestError';
