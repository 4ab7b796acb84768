import type { FqdnConfig } from './config';
import { InvalidHostnameError, RowContext, UnknownInterfaceTypeError } from './errors';

// Compound names such as "port-channel" first, then a plain run of letters.
const COMPOUND_TYPE_RE = /^[a-z]+-[a-z]+/;
const SIMPLE_TYPE_RE = /^[a-z]+/;
const NUMBER_RE = /[0-9].*/;

export interface InterfaceLabel {
  /** Long-form type, e.g. "gigabitethernet" or "port-channel". */
  type: string;
  /** Everything from the first digit on, e.g. "0-1"; empty when there is none. */
  number: string;
}

/** Collapse every run of two or more dashes into a single dash. */
export function collapseDashes(value: string): string {
  return value.replace(/-{2,}/g, '-');
}

/**
 * Reduce a device hostname to its canonical short label.
 * `Switch_01.example.com` → `switch-01`
 */
export function normalizeDeviceHostname(raw: string, context: RowContext = {}): string {
  let hostname = typeof raw === 'string' ? raw.trim().toLowerCase() : '';
  const dot = hostname.indexOf('.');
  if (dot >= 0) hostname = hostname.slice(0, dot);
  hostname = collapseDashes(hostname.replace(/_/g, '-'));

  if (!hostname) {
    throw new InvalidHostnameError(`'${raw}' does not yield a hostname`, { ...context, hostname: raw });
  }
  return hostname;
}

/**
 * Split a raw interface name into its type and number parts.
 * Separators (`_ . : /`) become dashes before splitting, so `0/1` comes out as `0-1`.
 */
export function parseInterfaceLabel(raw: string): InterfaceLabel {
  const label = collapseDashes(raw.trim().toLowerCase().replace(/[_.:/]/g, '-'));
  const typeMatch = COMPOUND_TYPE_RE.exec(label) ?? SIMPLE_TYPE_RE.exec(label);
  const numberMatch = NUMBER_RE.exec(label);
  return {
    type: typeMatch ? typeMatch[0] : '',
    number: numberMatch ? numberMatch[0].replace(/^-+|-+$/g, '') : '',
  };
}

/**
 * Build the interface-level hostname `<device>-<abbr>[-<number>]`.
 * Throws UnknownInterfaceTypeError when the type is missing from the abbreviation table.
 */
export function normalizeInterfaceHostname(
  deviceHostname: string,
  rawInterface: string,
  config: Pick<FqdnConfig, 'interfaceMap'>,
  context: RowContext = {},
): string {
  const { type, number } = parseInterfaceLabel(rawInterface);
  const ctx: RowContext = { ...context, hostname: deviceHostname, interfaceName: rawInterface };

  const abbreviation = Object.prototype.hasOwnProperty.call(config.interfaceMap, type)
    ? config.interfaceMap[type]
    : undefined;
  if (!type || abbreviation === undefined) {
    throw new UnknownInterfaceTypeError(type || rawInterface.trim().toLowerCase(), ctx);
  }

  return number ? `${deviceHostname}-${abbreviation}-${number}` : `${deviceHostname}-${abbreviation}`;
}
