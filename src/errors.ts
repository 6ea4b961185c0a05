export type ThermalMapErrorCode = 'MISSING_FILE' | 'MISSING_TEMPLATE' | 'INVALID_TEMPLATE';

/**
 * Failure raised before any processing starts: an input that cannot be opened
 * or a template workbook that cannot be used at all.
 *
 * Unrecognized log lines and templates without integer cells are not errors.
 */
export class ThermalMapError extends Error {
  readonly code: ThermalMapErrorCode;
  readonly path: string;

  constructor(code: ThermalMapErrorCode, message: string, path: string) {
    super(message);
    this.name = 'ThermalMapError';
    this.code = code;
    this.path = path;
  }
}

export function isThermalMapError(err: unknown): err is ThermalMapError {
  return err instanceof ThermalMapError;
}
