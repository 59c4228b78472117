import {mkdtemp, rm, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest'
import {appConfigSchema} from '../src/config/schema.js'
import {InMemoryEventBus} from '../src/core/event-bus.js'
import {runQuery} from '../src/core/query-runner.js'
import type {QueryEvent} from '../src/providers/types.js'

describe('runQuery smoke test', () => {
  let dir = ''

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'routerq-smoke-'))
  })

  afterEach(async () => {
    vi.unstubAllGlobals()
    delete process.env.OPENROUTER_API_KEY
    await rm(dir, {recursive: true, force: true})
  })

  it('sends config routing, model and key, and returns parsed tool arguments', async () => {
    process.env.OPENROUTER_API_KEY = 'test-key'
    const specPath = join(dir, 'lookup.json')
    await writeFile(
      specPath,
      JSON.stringify({
        name: 'lookup',
        description: 'Look up a city',
        json_schema: {type: 'object', properties: {city: {type: 'string'}}}
      }),
      'utf8'
    )

    const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
      const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url
      expect(url).toBe('https://router.example.test/v1/chat/completions')
      const headers = new Headers(init?.headers)
      expect(headers.get('authorization')).toBe('Bearer test-key')
      expect(headers.get('x-title')).toBe('routerq')

      const body = JSON.parse(String(init?.body)) as Record<string, unknown>
      expect(body).toEqual({
        model: 'test/model',
        temperature: 0,
        messages: [
          {role: 'user', content: 'You are a geographer.'},
          {role: 'user', content: 'Capital of France?'}
        ],
        tools: [
          {
            type: 'function',
            function: {
              name: 'lookup',
              description: 'Look up a city',
              parameters: {type: 'object', properties: {city: {type: 'string'}}}
            }
          }
        ],
        tool_choice: {type: 'function', function: {name: 'lookup'}},
        provider: {order: ['Groq'], ignore: ['Hyperbolic']}
      })

      return new Response(
        JSON.stringify({
          id: 'gen-smoke',
          model: 'test/model',
          created: 1_700_000_123,
          choices: [
            {
              message: {
                role: 'assistant',
                content: null,
                tool_calls: [{id: 'call_1', type: 'function', function: {name: 'lookup', arguments: '{"city":"Paris"}'}}]
              }
            }
          ],
          usage: {prompt_tokens: 20, completion_tokens: 5}
        }),
        {status: 200, headers: {'Content-Type': 'application/json'}}
      )
    })
    vi.stubGlobal('fetch', fetchMock)

    const config = appConfigSchema.parse({
      baseURL: 'https://router.example.test/v1',
      homeDir: dir,
      routing: {order: ['Groq'], ignore: ['Hyperbolic']}
    })
    const bus = new InMemoryEventBus<QueryEvent>()
    const events: string[] = []
    bus.subscribe((event) => events.push(event.type))

    const result = await runQuery({
      config,
      bus,
      systemMessage: 'You are a geographer.',
      userMessage: 'Capital of France?',
      funcSpecPath: specPath,
      model: 'test/model',
      params: {temperature: 0, max_tokens: undefined},
      backoff: {sleep: async () => {}}
    })

    expect(fetchMock).toHaveBeenCalledOnce()
    expect(result.output).toEqual({city: 'Paris'})
    expect(result.inTokens).toBe(20)
    expect(result.outTokens).toBe(5)
    expect(result.info).toEqual({system_fingerprint: null, model: 'test/model', created: 1_700_000_123})
    expect(events).toEqual(['tool_calling', 'request_start', 'tool_call_parsed', 'response'])
  })
})
