import {z} from 'zod'
import {getQueryLogPath, getRouterqHome} from './paths.js'

const positiveInt = z.coerce.number().int().positive()
const positiveNumber = z.coerce.number().positive()

function blankAsUnset<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (typeof value === 'string' && value.trim() === '' ? undefined : value), schema)
}

export const appConfigSchema = z.object({
  baseURL: blankAsUnset(z.string().trim().url().default('https://openrouter.ai/api/v1')),
  model: blankAsUnset(z.string().trim().default('openai/gpt-4o-mini')),
  appTitle: blankAsUnset(z.string().trim().default('routerq')),
  homeDir: z.string().default(getRouterqHome()),
  logFile: z.string().optional(),
  routing: z
    .object({
      order: z.array(z.string().trim().min(1)).default(['Fireworks']),
      ignore: z.array(z.string().trim().min(1)).default(['Together', 'DeepInfra', 'Hyperbolic'])
    })
    .default({}),
  runtime: z
    .object({
      timeoutMs: positiveInt.default(600_000),
      maxTries: positiveInt.default(10),
      backoffFactor: positiveNumber.default(1.5),
      maxBackoffMs: positiveInt.default(60_000)
    })
    .default({})
}).transform((config) => ({
  ...config,
  logFile: config.logFile ?? getQueryLogPath(config.homeDir)
}))

export type AppConfig = z.infer<typeof appConfigSchema>
