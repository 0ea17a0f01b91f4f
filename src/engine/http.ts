import {
  HashMismatchError,
  InvalidInputError,
  ManifestCorruptError,
  NetworkFailureError,
  NotFoundError,
  TransferError,
  isErrorCategory,
  type NotFoundReason,
} from "../utils/errors";

const NOT_FOUND_REASONS: readonly NotFoundReason[] = [
  "transfer_unknown",
  "chunk_pending",
  "pair_code",
  "path",
];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNotFoundReason(value: unknown): value is NotFoundReason {
  return typeof value === "string" && NOT_FOUND_REASONS.some((reason) => reason === value);
}

/**
 * Turns a non-2xx response into a typed error. Client and validation failures
 * keep their category; anything the server could not handle is treated as a
 * transient network failure so the engine retries it.
 */
export async function responseError(response: Response, url: string): Promise<TransferError> {
  const text = await response.text().catch(() => "");
  let body: unknown = null;
  try {
    body = text ? JSON.parse(text) : null;
  } catch {
    body = null;
  }
  const category = isRecord(body) && isErrorCategory(body.error) ? body.error : null;
  const detail =
    isRecord(body) && typeof body.detail === "string"
      ? body.detail
      : text || response.statusText;
  const message = `Request to ${url} failed with status ${response.status}: ${detail}`;

  if (response.status === 404 || category === "NotFound") {
    const reason = isRecord(body) && isNotFoundReason(body.reason) ? body.reason : "path";
    return new NotFoundError(reason, message);
  }
  if (category === "InvalidInput" || (response.status >= 400 && response.status < 500 && category === null)) {
    return new InvalidInputError(message);
  }
  if (category === "HashMismatch") {
    return new HashMismatchError(message, "", "");
  }
  if (category === "ManifestCorrupt") {
    return new ManifestCorruptError(message);
  }
  return new NetworkFailureError(message);
}

/** `fetch` with a timeout; transport-level failures become NetworkFailure. */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  const signals = [AbortSignal.timeout(timeoutMs)];
  if (init.signal) signals.push(init.signal);
  try {
    return await fetch(url, { ...init, signal: anySignal(signals) });
  } catch (error) {
    if (init.signal?.aborted) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new NetworkFailureError(`Request to ${url} failed: ${reason}`, error);
  }
}

// AbortSignal.any() only arrived in Node 20.3; combine by hand
function anySignal(signals: AbortSignal[]): AbortSignal {
  const controller = new AbortController();
  for (const signal of signals) {
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    signal.addEventListener("abort", () => controller.abort(signal.reason), { once: true });
  }
  return controller.signal;
}

export async function requestJson(
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<unknown> {
  const response = await fetchWithTimeout(url, init, timeoutMs);
  if (!response.ok) throw await responseError(response, url);
  try {
    return await response.json();
  } catch (error) {
    if (init.signal?.aborted) throw error;
    throw new InvalidInputError(`Malformed JSON response from ${url}`, {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

export async function requestBuffer(
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Buffer> {
  const response = await fetchWithTimeout(url, init, timeoutMs);
  if (!response.ok) throw await responseError(response, url);
  try {
    return Buffer.from(await response.arrayBuffer());
  } catch (error) {
    if (init.signal?.aborted) throw error;
    throw new NetworkFailureError(`Body of ${url} was cut off`, error);
  }
}
