/**
 * Failure taxonomy and tagged outcomes.
 *
 * Strategies never throw across their boundary: they return a ParseOutcome.
 * Inside a strategy, bounds violations raise a MeshFormatError which
 * `Outcome.guard` turns back into a returned failure.
 */

export type FailureKind =
  | 'UnsupportedHeader'
  | 'DecompressionFailure'
  | 'OffsetCandidateExhausted'
  | 'IndexRegionNotFound'

export interface FailureReason {
  kind: FailureKind
  message: string
}

export interface Success<T> {
  ok: true
  value: T
  /**
   * Which candidate produced the value, e.g. "lz4@0x5a/old-layout"
   */
  source: string
}

export interface Failure {
  ok: false
  reason: FailureReason
}

export type ParseOutcome<T> = Success<T> | Failure

/**
 * Raised inside a strategy when the bytes contradict the layout being tried
 */
export class MeshFormatError extends Error {
  constructor(readonly kind: FailureKind, message: string) {
    super(message)
    this.name = 'MeshFormatError'
  }
}

/**
 * Constructors and combinators for ParseOutcome
 */
export class Outcome {
  static success<T>(value: T, source: string): Success<T> {
    return { ok: true, value, source }
  }

  static failure(kind: FailureKind, message: string): Failure {
    return { ok: false, reason: { kind, message } }
  }

  /**
   * Run a decode step, converting a MeshFormatError into a failure.
   * Any other error is a bug and propagates.
   */
  static guard<T>(run: () => ParseOutcome<T>): ParseOutcome<T> {
    try {
      return run()
    } catch (error) {
      if (error instanceof MeshFormatError) {
        return Outcome.failure(error.kind, error.message)
      }
      throw error
    }
  }

  /**
   * Try each candidate in order and return the first success.
   *
   * @param candidates Ordered candidates
   * @param attempt Decode step for one candidate
   * @param onFailure Called with every failed candidate, in order
   * @returns The winning candidate and its outcome, or undefined when all failed
   */
  static firstSuccess<C, T>(
    candidates: Iterable<C>,
    attempt: (candidate: C) => ParseOutcome<T>,
    onFailure?: (candidate: C, reason: FailureReason) => void
  ): { candidate: C; outcome: Success<T> } | undefined {
    for (const candidate of candidates) {
      const outcome = attempt(candidate)
      if (outcome.ok) {
        return { candidate, outcome }
      }
      onFailure?.(candidate, outcome.reason)
    }
    return undefined
  }
}
