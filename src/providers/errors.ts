import {APIConnectionError, InternalServerError, RateLimitError} from 'openai'

export type UnexpectedResponseKind =
  | 'missing_tool_call'
  | 'tool_name_mismatch'
  | 'invalid_arguments'
  | 'invalid_response'

/**
 * The completion came back in a shape the request ruled out, e.g. free text
 * when a tool call was forced. Never retried.
 */
export class UnexpectedResponseError extends Error {
  readonly kind: UnexpectedResponseKind
  readonly detail: Record<string, unknown>

  constructor(kind: UnexpectedResponseKind, message: string, detail: Record<string, unknown> = {}) {
    super(message)
    this.name = 'UnexpectedResponseError'
    this.kind = kind
    this.detail = detail
  }
}

// APIConnectionTimeoutError extends APIConnectionError.
export function isTransientError(error: unknown): boolean {
  return (
    error instanceof RateLimitError ||
    error instanceof APIConnectionError ||
    error instanceof InternalServerError
  )
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
