/**
 * Error taxonomy shared by the relay, the signaling hub and the transfer engine.
 * Every failure path raises one of these categories so HTTP responses, socket
 * frames and retry decisions can branch on `category` instead of message text.
 */
export const ERROR_CATEGORIES = [
  "NotFound",
  "InvalidInput",
  "IOFailure",
  "HashMismatch",
  "NetworkFailure",
  "Exhausted",
  "ManifestCorrupt",
] as const;

export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];

/** Why a lookup came back empty. Clients wait on `chunk_pending` and give up on the rest. */
export type NotFoundReason =
  | "transfer_unknown"
  | "chunk_pending"
  | "pair_code"
  | "path";

export class TransferError extends Error {
  readonly category: ErrorCategory;

  constructor(
    category: ErrorCategory,
    message: string,
    public details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.category = category;
    this.name = "TransferError";
  }
}

export class NotFoundError extends TransferError {
  constructor(
    public readonly reason: NotFoundReason,
    message: string,
    details?: unknown
  ) {
    super("NotFound", message, details);
    this.name = "NotFoundError";
  }
}

export class InvalidInputError extends TransferError {
  constructor(message: string, details?: unknown) {
    super("InvalidInput", message, details);
    this.name = "InvalidInputError";
  }
}

export class IOFailureError extends TransferError {
  constructor(message: string, cause?: unknown) {
    super("IOFailure", message, undefined, { cause });
    this.name = "IOFailureError";
  }
}

export class HashMismatchError extends TransferError {
  constructor(
    message: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super("HashMismatch", message, { expected, actual });
    this.name = "HashMismatchError";
  }
}

export class NetworkFailureError extends TransferError {
  constructor(message: string, cause?: unknown) {
    super("NetworkFailure", message, undefined, { cause });
    this.name = "NetworkFailureError";
  }
}

export class ExhaustedError extends TransferError {
  constructor(
    message: string,
    public readonly attempts: number,
    cause?: unknown
  ) {
    super("Exhausted", message, { attempts }, { cause });
    this.name = "ExhaustedError";
  }
}

export class ManifestCorruptError extends TransferError {
  constructor(message: string, details?: unknown) {
    super("ManifestCorrupt", message, details);
    this.name = "ManifestCorruptError";
  }
}

/** Type guard: true if `x` names one of the error categories. */
export function isErrorCategory(x: unknown): x is ErrorCategory {
  return (
    typeof x === "string" && ERROR_CATEGORIES.some((category) => category === x)
  );
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error) {
    const code = error.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Normalizes anything thrown by fs or a library into the taxonomy.
 * `ENOENT` becomes NotFound with the given reason, other errno failures IOFailure.
 */
export function toTransferError(
  error: unknown,
  context: string,
  notFoundReason: NotFoundReason = "path"
): TransferError {
  if (error instanceof TransferError) return error;
  const code = errnoCode(error);
  if (code === "ENOENT") {
    return new NotFoundError(notFoundReason, `${context}: not found`);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new IOFailureError(`${context}: ${message}`, error);
}

/** HTTP status for each category, used by the Express error middleware and clients. */
export const HTTP_STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  NotFound: 404,
  InvalidInput: 400,
  HashMismatch: 422,
  ManifestCorrupt: 500,
  IOFailure: 500,
  NetworkFailure: 502,
  Exhausted: 503,
};
