export type ProvisioningErrorKind = 'SETUP' | 'VALIDATION' | 'ENTITY';

export interface ProvisioningErrorOptions {
  kind: ProvisioningErrorKind;
  code: string;
  message?: string;
  status?: number;
  details?: unknown;
}

/**
 * SETUP and VALIDATION errors end the phase they occur in. ENTITY errors
 * describe one failed create/update call and are recorded, not propagated.
 */
export class ProvisioningError extends Error {
  readonly kind: ProvisioningErrorKind;
  readonly code: string;
  readonly status?: number;
  readonly details?: unknown;

  constructor(opts: ProvisioningErrorOptions) {
    super(opts.message ?? opts.code);
    this.name = 'ProvisioningError';
    this.kind = opts.kind;
    this.code = opts.code;
    this.status = opts.status;
    this.details = opts.details;
  }

  static setup(code: string, message?: string, details?: unknown): ProvisioningError {
    return new ProvisioningError({ kind: 'SETUP', code, message, details });
  }

  static validation(code: string, message?: string, details?: unknown): ProvisioningError {
    return new ProvisioningError({ kind: 'VALIDATION', code, message, details });
  }

  static entity(
    code: string,
    message?: string,
    status?: number,
    details?: unknown
  ): ProvisioningError {
    return new ProvisioningError({ kind: 'ENTITY', code, message, status, details });
  }
}

export function isProvisioningError(
  error: unknown,
  kind?: ProvisioningErrorKind
): error is ProvisioningError {
  return error instanceof ProvisioningError && (kind === undefined || error.kind === kind);
}

/** True for errors that must end the running phase instead of being recorded per entity. */
export function isPhaseFatal(error: unknown): boolean {
  return isProvisioningError(error, 'SETUP') || isProvisioningError(error, 'VALIDATION');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
