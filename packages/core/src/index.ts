// Errors
export {
  type NewsdeskErrorCode,
  NewsdeskError,
  InvalidArgumentError,
  CorpusUnavailableError,
  CorpusLoadError,
  CorpusValidationError,
  CorpusConflictError,
  NotFoundError,
  SigningUnavailableError,
  isNewsdeskError,
} from './errors.js';

// Confidence taxonomy
export * from './confidence/index.js';

// Corpus store
export * from './corpus/index.js';

// Query engine
export * from './query/index.js';

// Integrity
export * from './integrity/index.js';
