export {
  ACCESS_LEVEL_HIERARCHY,
  isValidAccessLevel,
  compareAccessLevels,
  getMostRestrictiveLevel,
} from './accessLevels';

export {
  MASKERS,
  FULL_MASK,
  FULL_EMAIL_MASK,
  createMaskerRegistry,
  applyMask,
  maskEmail,
  maskPhone,
  maskNric,
  maskAddress,
  maskSsn,
} from './maskers';
export type { FieldMasker, MaskerRegistry, BuiltInMaskerName } from './maskers';
