export {backoffCreate, backoffDelay, type BackoffOptions, type BackoffRetry} from './providers/backoff.js'
export {isTransientError, UnexpectedResponseError, type UnexpectedResponseKind} from './providers/errors.js'
export {FunctionSpec, type FunctionSpecInit} from './providers/function-spec.js'
export {
  buildMessages,
  buildRequest,
  createOpenRouterClient,
  DEFAULT_ROUTING,
  OPENROUTER_BASE_URL,
  OpenRouterProvider,
  query,
  type ChatCompletionRequest,
  type OpenRouterClientOptions,
  type OpenRouterProviderOptions,
  type QueryOptions
} from './providers/openrouter-provider.js'
export type * from './providers/types.js'
export {InMemoryEventBus, type EventBus, type EventHandler} from './core/event-bus.js'
export {QueryLogSubscriber} from './core/subscribers/query-log-subscriber.js'
export {runQuery, providerFromConfig, type RunQueryOptions} from './core/query-runner.js'
export {loadConfig} from './config/load-config.js'
export type {AppConfig} from './config/schema.js'
