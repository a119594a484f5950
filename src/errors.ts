/**
 * Error taxonomy for ticket purchases, funding and coin-join attempts.
 *
 * `recoverable` errors abandon the current attempt only; the next block
 * notification may try again with a fresh unspent-output snapshot.
 * `fatal` errors stop the long-lived purchase loop.
 */
export enum TicketBuyerErrorCode {
  INSUFFICIENT_BALANCE = 'INSUFFICIENT_BALANCE',
  FEE_CONVERGENCE_FAILED = 'FEE_CONVERGENCE_FAILED',
  UNSUPPORTED_SCRIPT_CLASS = 'UNSUPPORTED_SCRIPT_CLASS',

  // Joint transaction failed post-mix validation
  MISSING_INPUTS = 'MISSING_INPUTS',
  MISSING_CHANGE = 'MISSING_CHANGE',
  MISSING_COMMITMENT = 'MISSING_COMMITMENT',

  INVALID_TICKET = 'INVALID_TICKET',
  INVALID_STATE = 'INVALID_STATE',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  MALFORMED_TRANSACTION = 'MALFORMED_TRANSACTION',

  RPC_ERROR = 'RPC_ERROR',
  TRANSPORT = 'TRANSPORT',
  CANCELLED = 'CANCELLED',

  PUBLISH_FAILED = 'PUBLISH_FAILED',
  BUG = 'BUG',
}

const RECOVERABLE_CODES = new Set<TicketBuyerErrorCode>([
  TicketBuyerErrorCode.INSUFFICIENT_BALANCE,
  TicketBuyerErrorCode.FEE_CONVERGENCE_FAILED,
  TicketBuyerErrorCode.UNSUPPORTED_SCRIPT_CLASS,
  TicketBuyerErrorCode.MISSING_INPUTS,
  TicketBuyerErrorCode.MISSING_CHANGE,
  TicketBuyerErrorCode.MISSING_COMMITMENT,
  TicketBuyerErrorCode.RPC_ERROR,
  TicketBuyerErrorCode.TRANSPORT,
  TicketBuyerErrorCode.CANCELLED,
]);

const FATAL_CODES = new Set<TicketBuyerErrorCode>([
  TicketBuyerErrorCode.BUG,
  TicketBuyerErrorCode.PUBLISH_FAILED,
]);

export class TicketBuyerError extends Error {
  public readonly code: TicketBuyerErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly recoverable: boolean;
  public readonly fatal: boolean;

  constructor(
    code: TicketBuyerErrorCode,
    message: string,
    options?: {
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TicketBuyerError';
    this.code = code;
    this.details = options?.details;
    this.recoverable = RECOVERABLE_CODES.has(code);
    this.fatal = FATAL_CODES.has(code);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      fatal: this.fatal,
      details: this.details,
    };
  }
}

export function isTicketBuyerError(error: unknown): error is TicketBuyerError {
  return error instanceof TicketBuyerError;
}

export function hasErrorCode(error: unknown, code: TicketBuyerErrorCode): error is TicketBuyerError {
  return isTicketBuyerError(error) && error.code === code;
}

/**
 * Normalise anything thrown by a collaborator into a TicketBuyerError,
 * keeping the original message verbatim.
 */
export function wrapError(
  error: unknown,
  defaultCode: TicketBuyerErrorCode = TicketBuyerErrorCode.TRANSPORT,
): TicketBuyerError {
  if (isTicketBuyerError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new TicketBuyerError(defaultCode, error.message, { cause: error });
  }
  return new TicketBuyerError(defaultCode, String(error));
}

export const Errors = {
  insufficientBalance: (target: bigint, available: bigint) =>
    new TicketBuyerError(
      TicketBuyerErrorCode.INSUFFICIENT_BALANCE,
      `insufficient balance: need ${target} atoms, ${available} available`,
      { details: { target: target.toString(), available: available.toString() } },
    ),

  feeConvergenceFailed: (iterations: number, targetFee: bigint) =>
    new TicketBuyerError(
      TicketBuyerErrorCode.FEE_CONVERGENCE_FAILED,
      `fee did not converge after ${iterations} iterations`,
      { details: { iterations, targetFee: targetFee.toString() } },
    ),

  unsupportedScriptClass: (scriptClass: string, nested = false) =>
    new TicketBuyerError(
      TicketBuyerErrorCode.UNSUPPORTED_SCRIPT_CLASS,
      `unexpected ${nested ? 'nested ' : ''}script class for credit: ${scriptClass}`,
      { details: { scriptClass, nested } },
    ),

  malformedRpcResult: (what: string) =>
    new TicketBuyerError(TicketBuyerErrorCode.RPC_ERROR, `malformed wallet response: ${what}`),

  missingInputs: () =>
    new TicketBuyerError(TicketBuyerErrorCode.MISSING_INPUTS, 'coinjoin is missing inputs'),

  missingChange: () =>
    new TicketBuyerError(TicketBuyerErrorCode.MISSING_CHANGE, 'coinjoin is missing change'),

  missingCommitment: () =>
    new TicketBuyerError(
      TicketBuyerErrorCode.MISSING_COMMITMENT,
      'coinjoin is missing gen output',
    ),

  invalidState: (operation: string, state: string) =>
    new TicketBuyerError(
      TicketBuyerErrorCode.INVALID_STATE,
      `cannot ${operation} in state ${state}`,
      { details: { operation, state } },
    ),

  invalidArgument: (message: string) =>
    new TicketBuyerError(TicketBuyerErrorCode.INVALID_ARGUMENT, message),

  malformedTransaction: (message: string) =>
    new TicketBuyerError(TicketBuyerErrorCode.MALFORMED_TRANSACTION, message),

  bug: (message: string, details?: Record<string, unknown>) =>
    new TicketBuyerError(TicketBuyerErrorCode.BUG, message, { details }),

  cancelled: (reason?: string) =>
    new TicketBuyerError(TicketBuyerErrorCode.CANCELLED, reason || 'attempt cancelled'),
};
