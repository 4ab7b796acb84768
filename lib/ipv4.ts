import * as ipaddr from 'ipaddr.js';
import { InvalidAddressError, RowContext } from './errors';

/**
 * Parse a strict dotted-quad IPv4 address (four decimal octets, no leading zeros).
 * Returns the parsed address; throws InvalidAddressError otherwise.
 */
export function parseIPv4(input: string, context: RowContext = {}): ipaddr.IPv4 {
  const s = typeof input === 'string' ? input.trim() : '';
  if (!ipaddr.IPv4.isValidFourPartDecimal(s)) {
    throw new InvalidAddressError(`'${input}' is not a valid IPv4 address`, context);
  }
  return ipaddr.IPv4.parse(s);
}

/**
 * in-addr.arpa name for an address, e.g. 10.0.0.1 → 1.0.0.10.in-addr.arpa
 */
export function reversePointer(addr: ipaddr.IPv4): string {
  return `${addr.toByteArray().reverse().join('.')}.in-addr.arpa`;
}
