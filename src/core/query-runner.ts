import {readFile} from 'node:fs/promises'
import {getApiKey, loadConfig} from '../config/load-config.js'
import type {AppConfig} from '../config/schema.js'
import type {BackoffOptions} from '../providers/backoff.js'
import {FunctionSpec} from '../providers/function-spec.js'
import {createOpenRouterClient, OpenRouterProvider} from '../providers/openrouter-provider.js'
import type {QueryEvent, QueryResult} from '../providers/types.js'
import type {EventBus} from './event-bus.js'

export type RunQueryOptions = {
  systemMessage?: string
  userMessage?: string
  funcSpecPath?: string
  model?: string
  params?: Record<string, unknown>
  bus?: EventBus<QueryEvent>
  backoff?: Pick<BackoffOptions, 'sleep' | 'random'>
  config?: AppConfig
}

async function loadFunctionSpec(path: string): Promise<FunctionSpec> {
  const raw = await readFile(path, 'utf8')
  return FunctionSpec.fromJSON(JSON.parse(raw))
}

export function providerFromConfig(
  config: AppConfig,
  bus?: EventBus<QueryEvent>,
  backoff: Pick<BackoffOptions, 'sleep' | 'random'> = {}
): OpenRouterProvider {
  const client = createOpenRouterClient({
    apiKey: getApiKey(),
    baseUrl: config.baseURL,
    timeoutMs: config.runtime.timeoutMs,
    appTitle: config.appTitle
  })

  return new OpenRouterProvider({
    client,
    routing: config.routing,
    backoff: {
      ...backoff,
      maxTries: config.runtime.maxTries,
      factor: config.runtime.backoffFactor,
      maxDelayMs: config.runtime.maxBackoffMs
    },
    bus
  })
}

export async function runQuery(options: RunQueryOptions): Promise<QueryResult> {
  const config = options.config ?? (await loadConfig())
  const funcSpec = options.funcSpecPath ? await loadFunctionSpec(options.funcSpecPath) : undefined
  const provider = providerFromConfig(config, options.bus, options.backoff)

  return provider.query({
    systemMessage: options.systemMessage,
    userMessage: options.userMessage,
    funcSpec,
    modelParams: {...options.params, model: options.model ?? config.model}
  })
}
