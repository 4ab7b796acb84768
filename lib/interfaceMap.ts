/** Long-form interface type (lowercase) → two-letter short name used in DNS labels. */
export type InterfaceMap = Record<string, string>;

// Extend as new vendor interface names show up.
export const DEFAULT_INTERFACE_MAP: Readonly<InterfaceMap> = Object.freeze({
  cellular: 'ce',
  fortygigabitethernet: 'fo',
  fortygige: 'fo',
  tengigabitethernet: 'te',
  gigabitethernet: 'gi',
  fastethernet: 'fa',
  ethernet: 'et',
  ge: 'gi',
  loopback: 'lo',
  loop: 'lo',
  multilink: 'mu',
  'port-channel': 'po',
  portchannel: 'po',
  'ether-channel': 'po',
  etherchannel: 'po',
  serial: 'se',
  tunnel: 'tu',
  vlan: 'vl',
  bvi: 'bv',
});
