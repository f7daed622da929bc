export type ProvisionErrorCode =
  | 'MISSING_VARIABLE'
  | 'INVALID_VARIABLE'
  | 'MISSING_EXECUTABLE'
  | 'MISSING_PATH'
  | 'ALREADY_CONFIGURED'
  | 'STEP_APPLY_FAILED'
  | 'REGISTRATION_FAILED'
  | 'CLONE_FAILED';

export class ProvisionError extends Error {
  readonly code: ProvisionErrorCode;
  // Name of the variable, executable, path or step the error is about.
  readonly subject?: string;

  constructor(code: ProvisionErrorCode, message: string, opts?: { subject?: string; cause?: unknown }) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'ProvisionError';
    this.code = code;
    this.subject = opts?.subject;
  }
}

export type Result = { ok: true } | { ok: false; error: ProvisionError };

export function describeCause(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
