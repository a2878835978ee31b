import { isIP } from 'node:net';
import { ConfigurationError } from '../core/errors.js';

/**
 * Absolute presentation form: trailing dot, root is `.`
 */
export function toAbsolute(name: string): string {
  const trimmed = name.trim();
  if (trimmed === '' || trimmed === '.') return '.';
  return trimmed.endsWith('.') ? trimmed : `${trimmed}.`;
}

/**
 * Lower-cased absolute form, for equality checks
 */
export function canonicalName(name: string): string {
  return toAbsolute(name).toLowerCase();
}

export function namesEqual(left: string, right: string): boolean {
  return canonicalName(left) === canonicalName(right);
}

function labels(name: string): string[] {
  const absolute = canonicalName(name);
  if (absolute === '.') return [];
  return absolute.slice(0, -1).split('.');
}

/**
 * Canonical DNS name order (RFC 4034, section 6.1): compare label by label
 * starting at the root, case-insensitively.
 */
export function compareNames(left: string, right: string): number {
  const a = labels(left).reverse();
  const b = labels(right).reverse();
  const length = Math.min(a.length, b.length);

  for (let i = 0; i < length; i++) {
    const cmp = Buffer.compare(Buffer.from(a[i], 'utf8'), Buffer.from(b[i], 'utf8'));
    if (cmp !== 0) return cmp;
  }
  return a.length - b.length;
}

function expandIPv6(address: string): string[] {
  const [head, tail] = address.includes('::') ? address.split('::') : [address, undefined];
  const headGroups = head ? head.split(':') : [];
  const tailGroups = tail ? tail.split(':') : [];

  // Embedded IPv4 suffix (::ffff:192.0.2.1)
  const last = tailGroups.length > 0 ? tailGroups : headGroups;
  const lastGroup = last[last.length - 1];
  if (lastGroup !== undefined && lastGroup.includes('.')) {
    const octets = lastGroup.split('.').map(Number);
    last.splice(
      last.length - 1,
      1,
      ((octets[0] << 8) | octets[1]).toString(16),
      ((octets[2] << 8) | octets[3]).toString(16)
    );
  }

  const missing = tail === undefined ? 0 : 8 - headGroups.length - tailGroups.length;
  const groups = [...headGroups, ...Array<string>(missing).fill('0'), ...tailGroups];
  return groups.map((group) => group.padStart(4, '0').toLowerCase());
}

/**
 * Name for a reverse (PTR) lookup of an address
 *
 * @example
 * ```typescript
 * reverseName('192.0.2.1'); // '1.2.0.192.in-addr.arpa.'
 * ```
 */
export function reverseName(address: string): string {
  switch (isIP(address)) {
    case 4:
      return `${address.split('.').reverse().join('.')}.in-addr.arpa.`;
    case 6: {
      const nibbles = expandIPv6(address).join('').split('');
      return `${nibbles.reverse().join('.')}.ip6.arpa.`;
    }
    default:
      throw new ConfigurationError(`Not an IP address: ${address}`, { configKey: 'address' });
  }
}
