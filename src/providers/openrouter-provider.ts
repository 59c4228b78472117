import {randomUUID} from 'node:crypto'
import OpenAI from 'openai'
import type {ChatCompletionNamedToolChoice, ChatCompletionTool} from 'openai/resources/chat/completions'
import {z} from 'zod'
import type {EventBus} from '../core/event-bus.js'
import {backoffCreate, type BackoffOptions} from './backoff.js'
import {errorMessage, isTransientError, UnexpectedResponseError} from './errors.js'
import type {FunctionSpec} from './function-spec.js'
import type {
  ChatMessage,
  ProviderRouting,
  QueryEvent,
  QueryInput,
  QueryOutput,
  QueryProvider,
  QueryResult
} from './types.js'

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1'

export const DEFAULT_ROUTING: ProviderRouting = {
  order: ['Fireworks'],
  ignore: ['Together', 'DeepInfra', 'Hyperbolic']
}

export type OpenRouterClientOptions = {
  apiKey?: string
  baseUrl?: string
  timeoutMs?: number
  appTitle?: string
}

export type QueryOptions = {
  routing?: ProviderRouting
  backoff?: Omit<BackoffOptions, 'onRetry'>
  bus?: EventBus<QueryEvent>
}

export type OpenRouterProviderOptions = OpenRouterClientOptions &
  QueryOptions & {
    client?: OpenAI
  }

export type ChatCompletionRequest = {
  model: string
  messages: ChatMessage[]
  tools?: ChatCompletionTool[]
  tool_choice?: ChatCompletionNamedToolChoice
  provider: ProviderRouting
  [param: string]: unknown
}

const completionSchema = z.object({
  model: z.string(),
  created: z.number(),
  system_fingerprint: z.string().nullish(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string().optional(),
                function: z.object({name: z.string(), arguments: z.string()})
              })
            )
            .nullish()
        })
      })
    )
    .min(1),
  usage: z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number()
  })
})

type Completion = z.infer<typeof completionSchema>

const argumentsSchema = z.record(z.string(), z.unknown())

/**
 * Builds an SDK client for OpenRouter. SDK-level retries stay off; transient
 * failures are retried by {@link backoffCreate}. Without `apiKey` the key is
 * read from `OPENROUTER_API_KEY`; a missing key is not checked here, the first
 * request fails with an authentication error instead.
 */
export function createOpenRouterClient(options: OpenRouterClientOptions = {}): OpenAI {
  const baseURL = (options.baseUrl ?? OPENROUTER_BASE_URL).replace(/\/+$/, '')
  return new OpenAI({
    apiKey: options.apiKey ?? process.env.OPENROUTER_API_KEY?.trim() ?? '',
    baseURL,
    maxRetries: 0,
    ...(options.timeoutMs ? {timeout: options.timeoutMs} : {}),
    ...(options.appTitle ? {defaultHeaders: {'X-Title': options.appTitle}} : {})
  })
}

export function buildMessages(systemMessage?: string | null, userMessage?: string | null): ChatMessage[] {
  const messages: ChatMessage[] = []
  for (const content of [systemMessage, userMessage]) {
    if (content) messages.push({role: 'user', content})
  }

  return messages
}

function stripUnset(params: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(params).filter(([, value]) => value !== undefined && value !== null))
}

export function buildRequest(input: QueryInput, routing: ProviderRouting = DEFAULT_ROUTING): ChatCompletionRequest {
  const {model, ...params} = input.modelParams
  const funcSpec = input.funcSpec ?? undefined

  return {
    ...stripUnset(params),
    model,
    messages: buildMessages(input.systemMessage, input.userMessage),
    ...(funcSpec ? {tools: [funcSpec.asOpenAITool()], tool_choice: funcSpec.openAIToolChoice()} : {}),
    provider: {order: [...routing.order], ignore: [...routing.ignore]}
  }
}

function parseCompletion(body: unknown): Completion {
  const parsed = completionSchema.safeParse(body)
  if (!parsed.success) {
    throw new UnexpectedResponseError('invalid_response', `Completion payload has an unexpected shape: ${parsed.error.message}`, {
      issues: parsed.error.issues
    })
  }

  return parsed.data
}

function toolOutput(
  completion: Completion,
  funcSpec: FunctionSpec,
  queryId: string,
  bus?: EventBus<QueryEvent>
): Record<string, unknown> {
  const message = completion.choices[0].message
  const toolCall = message.tool_calls?.[0]
  if (!toolCall) {
    throw new UnexpectedResponseError(
      'missing_tool_call',
      `tool_calls is empty, not a tool call response: ${JSON.stringify(message)}`,
      {message}
    )
  }

  if (toolCall.function.name !== funcSpec.name) {
    throw new UnexpectedResponseError(
      'tool_name_mismatch',
      `Function name mismatch: expected ${funcSpec.name}, got ${toolCall.function.name}`,
      {expected: funcSpec.name, actual: toolCall.function.name}
    )
  }

  const rawArguments = toolCall.function.arguments
  let parsed: unknown
  try {
    parsed = JSON.parse(rawArguments)
  } catch (error) {
    bus?.publish({
      type: 'tool_arguments_invalid',
      queryId,
      tool: funcSpec.name,
      rawArguments,
      error: errorMessage(error)
    })
    throw error
  }

  const args = argumentsSchema.safeParse(parsed)
  if (!args.success) {
    throw new UnexpectedResponseError(
      'invalid_arguments',
      `Tool call arguments for ${funcSpec.name} are not a JSON object: ${rawArguments}`,
      {rawArguments}
    )
  }

  bus?.publish({type: 'tool_call_parsed', queryId, tool: funcSpec.name})
  return args.data
}

/**
 * Sends one chat completion through `client` and normalizes the answer.
 * With a `funcSpec` the model is forced to call that tool and the output is
 * the parsed tool arguments; otherwise it is the message text.
 */
export async function query(client: OpenAI, input: QueryInput, options: QueryOptions = {}): Promise<QueryResult> {
  const {bus} = options
  const queryId = randomUUID()
  const funcSpec = input.funcSpec ?? undefined

  if (funcSpec) bus?.publish({type: 'tool_calling', queryId, tool: funcSpec.name})
  const request = buildRequest(input, options.routing)
  bus?.publish({type: 'request_start', queryId, model: request.model, messageCount: request.messages.length})

  const startedAt = performance.now()
  const body = await backoffCreate(() => client.post('/chat/completions', {body: request}), isTransientError, {
    ...options.backoff,
    onRetry: (retry) => bus?.publish({type: 'backoff', queryId, ...retry})
  })
  const reqTime = (performance.now() - startedAt) / 1000

  const completion = parseCompletion(body)
  const output: QueryOutput = funcSpec
    ? toolOutput(completion, funcSpec, queryId, bus)
    : completion.choices[0].message.content ?? null

  const inTokens = completion.usage.prompt_tokens
  const outTokens = completion.usage.completion_tokens
  bus?.publish({type: 'response', queryId, model: completion.model, reqTime, inTokens, outTokens})

  return {
    output,
    reqTime,
    inTokens,
    outTokens,
    info: {
      system_fingerprint: completion.system_fingerprint ?? null,
      model: completion.model,
      created: completion.created
    }
  }
}

export class OpenRouterProvider implements QueryProvider {
  readonly name = 'openrouter'
  private readonly client: OpenAI
  private readonly options: QueryOptions

  constructor(options: OpenRouterProviderOptions = {}) {
    this.client = options.client ?? createOpenRouterClient(options)
    this.options = {
      routing: options.routing ?? DEFAULT_ROUTING,
      backoff: options.backoff,
      bus: options.bus
    }
  }

  async query(input: QueryInput): Promise<QueryResult> {
    return query(this.client, input, this.options)
  }
}
