// Path: src/lib/secrets/mac.ts
// Random MAC addresses for the AdGuard Home macvlan interface

import crypto from 'node:crypto';

/**
 * Random locally administered, unicast MAC address in the 02:00:00 range.
 */
export function generateLocallyAdministeredMac(): string {
  const octets = [...crypto.randomBytes(3)].map((byte) => byte.toString(16).padStart(2, '0'));
  return `02:00:00:${octets.join(':')}`;
}
