// Path: src/lib/errors.ts
// Error taxonomy for the provisioning pipeline

import { ProvisionError, extractErrorMessage } from '../utils/error.js';

/**
 * A required environment variable is not set at all.
 */
export class MissingSecretError extends ProvisionError {
  readonly secretName: string;

  constructor(secretName: string, missing: readonly string[] = [secretName]) {
    const others = missing.filter((name) => name !== secretName);
    const suffix = others.length > 0 ? ` (also missing: ${others.join(', ')})` : '';
    super(`Required secret ${secretName} is not set${suffix}`, 'SECRET_MISSING', {
      metadata: { secret: secretName, missing: [...missing] },
    });
    this.name = 'MissingSecretError';
    this.secretName = secretName;
  }
}

/**
 * A secret is set but blank.
 */
export class EmptySecretError extends ProvisionError {
  readonly secretName: string;

  constructor(secretName: string) {
    super(`Secret ${secretName} is empty`, 'SECRET_EMPTY', {
      metadata: { secret: secretName },
    });
    this.name = 'EmptySecretError';
    this.secretName = secretName;
  }
}

/**
 * A delimited-list secret contains no usable item.
 */
export class MalformedListError extends ProvisionError {
  readonly secretName: string;

  constructor(secretName: string, delimiter: string) {
    super(
      `Secret ${secretName} has no items when split on "${delimiter}"`,
      'SECRET_LIST_MALFORMED',
      { metadata: { secret: secretName, delimiter } }
    );
    this.name = 'MalformedListError';
    this.secretName = secretName;
  }
}

/**
 * A scalar secret does not have the expected shape.
 * The value itself is never part of the message.
 */
export class MalformedSecretError extends ProvisionError {
  readonly secretName: string;

  constructor(secretName: string, expected: string) {
    super(`Secret ${secretName} is malformed: expected ${expected}`, 'SECRET_MALFORMED', {
      metadata: { secret: secretName, expected },
    });
    this.name = 'MalformedSecretError';
    this.secretName = secretName;
  }
}

/**
 * A template references a binding the validated secret set does not provide.
 */
export class UndefinedVariableError extends ProvisionError {
  readonly variable: string;
  readonly template: string;

  constructor(variable: string, template: string, line?: number) {
    const where = line !== undefined ? `${template}:${line}` : template;
    super(`Template ${where} references undefined variable "${variable}"`, 'TEMPLATE_UNDEFINED_VARIABLE', {
      metadata: { variable, template, line },
    });
    this.name = 'UndefinedVariableError';
    this.variable = variable;
    this.template = template;
  }
}

export type TemplateErrorCode =
  | 'TEMPLATE_NOT_FOUND'
  | 'TEMPLATE_UNREADABLE'
  | 'TEMPLATE_SYNTAX'
  | 'TEMPLATE_HELPER'
  | 'IGNITION_INVALID';

/**
 * A template could not be read, parsed or assembled.
 */
export class TemplateError extends ProvisionError {
  readonly template: string;

  constructor(message: string, code: TemplateErrorCode, template: string, cause?: unknown) {
    super(message, code, { cause, metadata: { template } });
    this.name = 'TemplateError';
    this.template = template;
  }
}

/**
 * A filesystem operation failed while writing the build output.
 */
export class WriteError extends ProvisionError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to write ${path}: ${extractErrorMessage(cause)}`, 'WRITE_FAILED', {
      cause,
      metadata: { path },
    });
    this.name = 'WriteError';
    this.path = path;
  }
}
