// Path: src/lib/secrets/loader.ts
// Reads the catalogued secrets from an injected environment mapping

import { MissingSecretError } from '../errors.js';
import { secretsLogger as log } from '../logger.js';
import { FrozenMap } from '../../utils/frozen-map.js';
import { SECRET_DEFINITIONS } from './definitions.js';
import type { EnvSource, SecretDefinition, SecretSet, SecretValue } from './types.js';

/**
 * Loads secrets from an explicit `name -> value` mapping.
 *
 * The loader never reads `process.env` itself; callers pass the environment
 * (usually the process environment merged over a dotenv file).
 */
export class SecretLoader {
  private readonly env: EnvSource;
  private readonly definitions: readonly SecretDefinition[];

  constructor(env: EnvSource, definitions: readonly SecretDefinition[] = SECRET_DEFINITIONS) {
    this.env = env;
    this.definitions = definitions;
  }

  /**
   * Names of required secrets whose variable is not set at all
   */
  missing(): string[] {
    return this.definitions
      .filter((def) => def.required && this.env[def.name] === undefined)
      .map((def) => def.name);
  }

  /**
   * Read every catalogued secret.
   *
   * @throws MissingSecretError naming the first required variable that is unset
   */
  load(): SecretSet {
    const missing = this.missing();
    if (missing.length > 0) {
      log.debug({ missing }, 'Required secrets not set');
      throw new MissingSecretError(missing[0], missing);
    }

    const secrets = new Map<string, SecretValue>();
    for (const definition of this.definitions) {
      const raw = this.env[definition.name];
      if (raw === undefined) {
        // Optional and unset
        continue;
      }
      secrets.set(definition.name, Object.freeze({
        name: definition.name,
        binding: definition.binding,
        raw,
        definition,
      }));
    }

    log.debug({ count: secrets.size }, 'Secrets loaded');
    return new FrozenMap(secrets);
  }
}
