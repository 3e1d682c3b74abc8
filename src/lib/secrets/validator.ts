// Path: src/lib/secrets/validator.ts
// Presence and shape validation for loaded secrets

import {
  EmptySecretError,
  MalformedListError,
  MalformedSecretError,
} from '../errors.js';
import { secretsLogger as log } from '../logger.js';
import { FrozenMap } from '../../utils/frozen-map.js';
import { SSH_KEY_DELIMITER } from './definitions.js';
import { parseDelimitedList } from './list.js';
import type {
  SecretSet,
  SecretValue,
  TemplateBindings,
  ValidatedSecret,
  ValidatedSecretSet,
} from './types.js';

export type SecretViolation = EmptySecretError | MalformedListError | MalformedSecretError;

export interface SecretCheckResult {
  valid: boolean;
  errors: SecretViolation[];
}

/**
 * Validate one secret, returning its validated form or the violation
 */
function checkSecret(secret: SecretValue): ValidatedSecret | SecretViolation {
  const { definition } = secret;

  if (secret.raw.trim() === '') {
    return new EmptySecretError(secret.name);
  }

  if (definition.kind === 'list') {
    const delimiter = definition.delimiter ?? SSH_KEY_DELIMITER;
    const items = parseDelimitedList(secret.raw, delimiter);
    if (items.length === 0) {
      return new MalformedListError(secret.name, delimiter);
    }
    return { kind: 'list', name: secret.name, binding: secret.binding, items };
  }

  const value = secret.raw;
  if (definition.pattern && !definition.pattern.test(value)) {
    return new MalformedSecretError(
      secret.name,
      definition.patternDescription ?? `a value matching ${definition.pattern.source}`
    );
  }
  return { kind: 'scalar', name: secret.name, binding: secret.binding, value };
}

function isViolation(result: ValidatedSecret | SecretViolation): result is SecretViolation {
  return result instanceof Error;
}

/**
 * Check every secret and report all violations, in catalogue order
 */
export function checkSecrets(secrets: SecretSet): SecretCheckResult {
  const errors: SecretViolation[] = [];
  for (const secret of secrets.values()) {
    const result = checkSecret(secret);
    if (isViolation(result)) {
      errors.push(result);
    }
  }
  return { valid: errors.length === 0, errors };
}

/**
 * Validate a secret set.
 *
 * @throws the first violation found; nothing downstream ever sees a partial set
 */
export function validateSecrets(secrets: SecretSet): ValidatedSecretSet {
  const validated = new Map<string, ValidatedSecret>();

  for (const secret of secrets.values()) {
    const result = checkSecret(secret);
    if (isViolation(result)) {
      log.debug({ secret: secret.name, code: result.code }, 'Secret failed validation');
      throw result;
    }
    validated.set(secret.name, Object.freeze(result));
  }

  log.debug({ count: validated.size }, 'Secrets validated');
  return Object.freeze({ secrets: new FrozenMap(validated) });
}

/**
 * Template bindings for a validated set: scalars as strings, lists as arrays
 */
export function toBindings(validated: ValidatedSecretSet): TemplateBindings {
  const bindings: Record<string, string | readonly string[]> = {};
  for (const secret of validated.secrets.values()) {
    bindings[secret.binding] = secret.kind === 'list' ? secret.items : secret.value;
  }
  return Object.freeze(bindings);
}

/**
 * Human-readable summary of a check result
 */
export function formatCheckResult(result: SecretCheckResult): string {
  if (result.valid) {
    return 'All secrets valid';
  }
  return result.errors.map((err) => `  - ${err.message}`).join('\n');
}
