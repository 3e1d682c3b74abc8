// Path: src/lib/secrets/definitions.ts
// Catalogue of the secrets the provisioning templates consume

import type { SecretDefinition } from './types.js';

export const SSH_KEY_DELIMITER = ';';

export const SECRET_DEFINITIONS: readonly SecretDefinition[] = [
  {
    name: 'ROOT_PASSWD',
    binding: 'root_passwd',
    kind: 'scalar',
    required: true,
    description: 'Password hash for root',
  },
  {
    name: 'ADMIN_PASSWD',
    binding: 'admin_passwd',
    kind: 'scalar',
    required: true,
    description: 'Password hash for the admin user',
  },
  {
    name: 'ADMIN_SSH_KEYS',
    binding: 'admin_ssh_keys',
    kind: 'list',
    required: true,
    delimiter: SSH_KEY_DELIMITER,
    description: 'Public keys authorized for the admin user, separated by ";"',
  },
  {
    name: 'ADMIN_OTP_SECRET',
    binding: 'admin_otp_secret',
    kind: 'scalar',
    required: true,
    pattern: /^(?:[0-9a-fA-F]{2})+$/,
    patternDescription: 'hex-encoded bytes',
    description: 'Hex-encoded TOTP shared secret for the admin user',
  },
  {
    name: 'DISK_PASSWD',
    binding: 'disk_passwd',
    kind: 'scalar',
    required: true,
    description: 'Fallback passphrase for the encrypted root volume',
  },
  {
    name: 'ADGUARD_MAC',
    binding: 'adguard_mac',
    kind: 'scalar',
    required: true,
    pattern: /^[0-9a-fA-F]{2}(?::[0-9a-fA-F]{2}){5}$/,
    patternDescription: 'a MAC address such as 02:00:00:00:00:01',
    description: 'MAC address of the AdGuard Home macvlan interface',
  },
];
