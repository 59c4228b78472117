import {describe, expect, it} from 'vitest'
import {appConfigSchema} from '../src/config/schema.js'
import {collectDiagnostics, describeRouting, worstCaseWaitMs} from '../src/core/diagnostics.js'

describe('worstCaseWaitMs', () => {
  it('sums the uncapped then capped backoff ceilings', () => {
    const config = appConfigSchema.parse({runtime: {maxTries: 4, backoffFactor: 1.5, maxBackoffMs: 5000}})
    // 1500 + 3000 + min(6000, 5000)
    expect(worstCaseWaitMs(config)).toBe(9500)
  })

  it('is zero when there is a single attempt', () => {
    const config = appConfigSchema.parse({runtime: {maxTries: 1}})
    expect(worstCaseWaitMs(config)).toBe(0)
  })
})

describe('collectDiagnostics', () => {
  it('reports key presence, endpoint, routing and files', () => {
    const config = appConfigSchema.parse({
      baseURL: 'https://router.example.test/v1/',
      homeDir: '/tmp/routerq-diag',
      routing: {order: ['Groq'], ignore: []},
      runtime: {maxTries: 2}
    })

    const report = collectDiagnostics(config, {OPENROUTER_API_KEY: 'test-key'}, '/work', (path) => path === '/work/.env')

    expect(report.apiKey).toBe('set')
    expect(report.endpoint).toBe('https://router.example.test/v1/chat/completions')
    expect(report.retry).toEqual({maxTries: 2, worstCaseWaitMs: 1500, timeoutMs: 600_000})
    expect(report.files.localEnv).toEqual({path: '/work/.env', exists: true})
    expect(report.files.queryLog).toEqual({path: '/tmp/routerq-diag/logs/queries.jsonl', exists: false})
    expect(describeRouting(report.routing)).toBe('prefer Groq; never (none)')
  })

  it('treats a blank key as missing', () => {
    const config = appConfigSchema.parse({})
    expect(collectDiagnostics(config, {OPENROUTER_API_KEY: '  '}, '/work', () => false).apiKey).toBe('missing')
    expect(describeRouting(config.routing)).toBe('prefer Fireworks; never Together, DeepInfra, Hyperbolic')
  })
})
