import type {FunctionSpec} from './function-spec.js'

/** Every prompt is sent with the user role; some routed models reject system messages. */
export type ChatMessage = {
  role: 'user'
  content: string
}

/**
 * Model parameters forwarded verbatim in the request body. Keys holding
 * `undefined` or `null` are dropped before sending.
 */
export type ModelParams = {
  model: string
  [param: string]: unknown
}

export type QueryInput = {
  systemMessage?: string | null
  userMessage?: string | null
  funcSpec?: FunctionSpec | null
  modelParams: ModelParams
}

export type QueryOutput = string | null | Record<string, unknown>

export type QueryInfo = {
  system_fingerprint: string | null
  model: string
  created: number
}

export type QueryResult = {
  output: QueryOutput
  /** Wall-clock seconds spent in the request, retries included. */
  reqTime: number
  inTokens: number
  outTokens: number
  info: QueryInfo
}

/** OpenRouter's `provider` request field. */
export type ProviderRouting = {
  order: string[]
  ignore: string[]
}

export type QueryEvent =
  | {type: 'tool_calling'; queryId: string; tool: string}
  | {type: 'request_start'; queryId: string; model: string; messageCount: number}
  | {type: 'backoff'; queryId: string; attempt: number; delayMs: number; error: string}
  | {type: 'response'; queryId: string; model: string; reqTime: number; inTokens: number; outTokens: number}
  | {type: 'tool_call_parsed'; queryId: string; tool: string}
  | {type: 'tool_arguments_invalid'; queryId: string; tool: string; rawArguments: string; error: string}

export interface QueryProvider {
  readonly name: string
  query(input: QueryInput): Promise<QueryResult>
}
