import { RequestError } from "octokit"

export class BranchKeeperError extends Error {
  readonly code: string
  override readonly cause?: unknown

  constructor(message: string, code: string, cause?: unknown) {
    super(message)
    this.name = new.target.name
    this.code = code
    this.cause = cause
  }
}

/** A dependency gave no response at all (DNS, connection reset, timeout). */
export class RemoteUnavailableError extends BranchKeeperError {
  constructor(what: string, cause?: unknown) {
    super(`${what}: no response from remote: ${causeMessage(cause)}`, "REMOTE_UNAVAILABLE", cause)
  }
}

/** A dependency answered with a non-2xx status. */
export class RemoteRejectedError extends BranchKeeperError {
  readonly status: number

  constructor(what: string, status: number, cause?: unknown) {
    const details = cause === undefined ? "" : `: ${causeMessage(cause)}`
    super(`${what}: remote answered ${status}${details}`, "REMOTE_REJECTED", cause)
    this.status = status
  }
}

export class NonFastForwardError extends BranchKeeperError {
  readonly ref: string

  constructor(ref: string, cause?: unknown) {
    super(`update of ${ref} is not a fast-forward`, "NON_FAST_FORWARD", cause)
    this.ref = ref
  }
}

export class DecodeError extends BranchKeeperError {
  readonly event: string

  constructor(event: string, details: string, cause?: unknown) {
    super(`failed to decode ${event} event: ${details}`, "DECODE_FAILED", cause)
    this.event = event
  }
}

export class AggregateSyncError extends BranchKeeperError {
  readonly errors: Error[]

  constructor(errors: Error[]) {
    const message =
      errors.length === 1 ? errors[0].message : `[${errors.map((e) => e.message).join(", ")}]`
    super(message, "SYNC_FAILED")
    this.errors = errors
  }
}

export const isDecodeError = (error: unknown): error is DecodeError => error instanceof DecodeError

const causeMessage = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause)

/**
 * Classify an Octokit failure. Octokit reports transport failures as a
 * RequestError without a response.
 */
export const toRemoteError = (error: unknown, what: string): Error => {
  if (error instanceof BranchKeeperError) return error
  if (error instanceof RequestError) {
    if (!error.response) return new RemoteUnavailableError(what, error)
    return new RemoteRejectedError(what, error.status, error)
  }
  return new RemoteUnavailableError(what, error)
}

/** Collapse a list of failures into one error, or nothing when the list is empty. */
export const aggregate = (errors: Error[]): AggregateSyncError | null =>
  errors.length === 0 ? null : new AggregateSyncError(errors)
