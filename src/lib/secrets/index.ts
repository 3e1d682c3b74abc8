// Path: src/lib/secrets/index.ts
// Public API for the secrets module

export type {
  SecretKind,
  SecretDefinition,
  SecretValue,
  SecretSet,
  ValidatedSecret,
  ValidatedSecretSet,
  TemplateBindings,
  EnvSource,
} from './types.js';

export { SECRET_DEFINITIONS, SSH_KEY_DELIMITER } from './definitions.js';
export { parseDelimitedList } from './list.js';
export { SecretLoader } from './loader.js';
export {
  checkSecrets,
  validateSecrets,
  toBindings,
  formatCheckResult,
  type SecretCheckResult,
  type SecretViolation,
} from './validator.js';
export { generateLocallyAdministeredMac } from './mac.js';
