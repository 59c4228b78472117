import {cosmiconfig} from 'cosmiconfig'
import dotenv from 'dotenv'
import {appConfigSchema, type AppConfig} from './schema.js'
import {getGlobalEnvPath, getRouterqHome} from './paths.js'

dotenv.config({path: getGlobalEnvPath()})
dotenv.config()

function nonEmpty(value?: string): string | undefined {
  if (!value) return undefined
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

function positiveIntFromEnv(name: string): number | undefined {
  const parsed = Number.parseInt(process.env[name] ?? '', 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined
}

export function listFromEnv(name: string): string[] | undefined {
  const raw = nonEmpty(process.env[name])
  if (!raw) return undefined
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** The API key lives in the environment only, never in config files. */
export function getApiKey(): string | undefined {
  return nonEmpty(process.env.OPENROUTER_API_KEY)
}

export async function loadConfig(): Promise<AppConfig> {
  const explorer = cosmiconfig('routerq')
  const result = await explorer.search()
  const base = isRecord(result?.config) ? result.config : {}
  const baseRouting = isRecord(base.routing) ? base.routing : {}
  const baseRuntime = isRecord(base.runtime) ? base.runtime : {}

  const order = listFromEnv('ROUTERQ_PROVIDER_ORDER')
  const ignore = listFromEnv('ROUTERQ_PROVIDER_IGNORE')
  const timeoutMs = positiveIntFromEnv('ROUTERQ_TIMEOUT_MS')
  const maxTries = positiveIntFromEnv('ROUTERQ_MAX_TRIES')

  const merged: Record<string, unknown> = {
    ...base,
    model: nonEmpty(process.env.OPENROUTER_MODEL) ?? base.model,
    baseURL: nonEmpty(process.env.OPENROUTER_BASE_URL) ?? base.baseURL,
    homeDir: nonEmpty(process.env.ROUTERQ_HOME) ? getRouterqHome() : base.homeDir,
    routing: {
      ...baseRouting,
      ...(order ? {order} : {}),
      ...(ignore ? {ignore} : {})
    },
    runtime: {
      ...baseRuntime,
      ...(timeoutMs ? {timeoutMs} : {}),
      ...(maxTries ? {maxTries} : {})
    }
  }

  return appConfigSchema.parse(merged)
}
