// Path: src/lib/secrets/list.ts
// Delimited list parsing for multi-value secrets

/**
 * Split a delimited secret into its items.
 * Items are trimmed, empty items dropped, input order kept.
 *
 * @example
 * parseDelimitedList('ssh-ed25519 AAA a@h; ssh-rsa BBB b@h', ';')
 * // ['ssh-ed25519 AAA a@h', 'ssh-rsa BBB b@h']
 */
export function parseDelimitedList(raw: string, delimiter: string): readonly string[] {
  if (!delimiter) {
    throw new Error('List delimiter cannot be empty');
  }

  const items = raw
    .split(delimiter)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  return Object.freeze(items);
}
