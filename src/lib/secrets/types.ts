// Path: src/lib/secrets/types.ts
// Type definitions for secret loading and validation

export type SecretKind = 'scalar' | 'list';

/**
 * Static description of one environment-sourced secret
 */
export interface SecretDefinition {
  /** Environment variable name */
  name: string;
  /** Name templates use to reference the value */
  binding: string;
  kind: SecretKind;
  required: boolean;
  /** Item separator for list secrets */
  delimiter?: string;
  /** Shape check for scalar secrets */
  pattern?: RegExp;
  /** Human-readable shape shown when the pattern does not match */
  patternDescription?: string;
  description: string;
}

/**
 * A secret as read from the environment, before validation.
 * List secrets keep their raw delimited string.
 */
export interface SecretValue {
  readonly name: string;
  readonly binding: string;
  readonly raw: string;
  readonly definition: SecretDefinition;
}

/**
 * Secrets of one run, keyed by environment variable name
 */
export type SecretSet = ReadonlyMap<string, SecretValue>;

export type ValidatedSecret =
  | { readonly kind: 'scalar'; readonly name: string; readonly binding: string; readonly value: string }
  | { readonly kind: 'list'; readonly name: string; readonly binding: string; readonly items: readonly string[] };

/**
 * Secret set that passed validation; the only input rendering accepts
 */
export interface ValidatedSecretSet {
  readonly secrets: ReadonlyMap<string, ValidatedSecret>;
}

/**
 * Values templates render against, keyed by binding name
 */
export type TemplateBindings = Readonly<Record<string, string | readonly string[]>>;

/**
 * Environment mapping handed to the loader
 */
export type EnvSource = Readonly<Record<string, string | undefined>>;
