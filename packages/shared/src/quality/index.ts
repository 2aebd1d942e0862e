export {
  VALIDATORS,
  createValidatorRegistry,
  runValidator,
  calculateNricChecksum,
  validateSingaporePostalCode,
  validateSingaporeNric,
  validateNric9Char,
  validateCurrencyCode,
  validateNationalityCode,
  validateGender,
  validateEmail,
  validatePhoneNumber,
  validateRequired,
} from './validators';
export type { Validator, ValidatorRegistry, BuiltInValidatorName } from './validators';

export {
  TRANSFORMERS,
  createTransformerRegistry,
  trim,
  uppercaseTrim,
  standardizeSingaporePostalCode,
  normalizeCurrencyCode,
  normalizeNationalityCode,
  normalizeGender,
  standardizePhoneNumber,
  extractPostalCodeFromAddress,
} from './transformers';
export type { Transformer, TransformerRegistry, BuiltInTransformerName } from './transformers';

export { scoreOutcomes, summarizeQuality, parseQualityFlags, qualityFlagName } from './scorer';
export type { ValidationOutcome, QualitySummary } from './scorer';

export { asText, isNullish } from './text';
