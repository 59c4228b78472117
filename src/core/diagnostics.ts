import {existsSync} from 'node:fs'
import {getGlobalEnvPath} from '../config/paths.js'
import type {AppConfig} from '../config/schema.js'
import {backoffDelay} from '../providers/backoff.js'

export type Diagnostics = {
  node: string
  apiKey: 'set' | 'missing'
  endpoint: string
  model: string
  routing: {order: string[]; ignore: string[]}
  retry: {
    maxTries: number
    /** Longest possible total wait across all retries, before jitter. */
    worstCaseWaitMs: number
    timeoutMs: number
  }
  files: Record<'globalEnv' | 'localEnv' | 'queryLog', {path: string; exists: boolean}>
  config: AppConfig
}

export function worstCaseWaitMs(config: AppConfig): number {
  const {maxTries, backoffFactor, maxBackoffMs} = config.runtime
  let total = 0
  for (let retry = 0; retry < maxTries - 1; retry += 1) {
    total += backoffDelay(retry, backoffFactor, maxBackoffMs, () => 1)
  }

  return total
}

export function collectDiagnostics(
  config: AppConfig,
  env: NodeJS.ProcessEnv = process.env,
  cwd = process.cwd(),
  exists: (path: string) => boolean = existsSync
): Diagnostics {
  const file = (path: string) => ({path, exists: exists(path)})
  return {
    node: process.version,
    apiKey: env.OPENROUTER_API_KEY?.trim() ? 'set' : 'missing',
    endpoint: `${config.baseURL.replace(/\/+$/, '')}/chat/completions`,
    model: config.model,
    routing: config.routing,
    retry: {
      maxTries: config.runtime.maxTries,
      worstCaseWaitMs: worstCaseWaitMs(config),
      timeoutMs: config.runtime.timeoutMs
    },
    files: {
      globalEnv: file(getGlobalEnvPath()),
      localEnv: file(`${cwd}/.env`),
      queryLog: file(config.logFile)
    },
    config
  }
}

export function describeRouting(routing: Diagnostics['routing']): string {
  const prefer = routing.order.length > 0 ? routing.order.join(' > ') : '(any)'
  const avoid = routing.ignore.length > 0 ? routing.ignore.join(', ') : '(none)'
  return `prefer ${prefer}; never ${avoid}`
}
