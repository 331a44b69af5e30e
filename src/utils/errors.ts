export type RollbackErrorKind =
  | 'CheckoutFailed'
  | 'CommitFailed'
  | 'HistoryUnavailable'
  | 'NotARepository'
  | 'PathNotFound'
  | 'ProtectedBranch'
  | 'WalkFailed'

export interface RollbackErrorOptions {
  branch?: string
  cause?: unknown
}

export class RollbackError extends Error {
  readonly kind: RollbackErrorKind
  readonly branch?: string

  constructor(kind: RollbackErrorKind, message: string, options: RollbackErrorOptions = {}) {
    super(message, {cause: options.cause})
    this.name = 'RollbackError'
    this.kind = kind
    this.branch = options.branch
  }
}

export function isRollbackError(error: unknown, kind?: RollbackErrorKind): error is RollbackError {
  return error instanceof RollbackError && (kind === undefined || error.kind === kind)
}

// Failed child processes already fold their captured stderr into `message`.
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message.trim() : String(error)
}
