export type RowErrorKind = 'InvalidAddress' | 'InvalidHostname' | 'UnknownInterfaceType';

/** Identifies the input row an error belongs to, for logs and failure listings. */
export interface RowContext {
  hostname?: string;
  ipAddress?: string;
  interfaceName?: string;
}

/**
 * Base for errors that reject a single row. The batch keeps going after one of these.
 */
export abstract class RowError extends Error {
  abstract readonly kind: RowErrorKind;

  constructor(message: string, readonly context: RowContext = {}) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidAddressError extends RowError {
  readonly kind = 'InvalidAddress';
}

export class InvalidHostnameError extends RowError {
  readonly kind = 'InvalidHostname';
}

export class UnknownInterfaceTypeError extends RowError {
  readonly kind = 'UnknownInterfaceType';

  constructor(readonly interfaceType: string, context: RowContext = {}) {
    super(`Interface type '${interfaceType}' not found in the interface abbreviation table`, context);
  }
}

export function isRowError(err: unknown): err is RowError {
  return err instanceof RowError;
}
