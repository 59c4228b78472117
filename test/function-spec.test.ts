import {describe, expect, it} from 'vitest'
import {ZodError} from 'zod'
import {FunctionSpec} from '../src/providers/function-spec.js'

const schema = {type: 'object', properties: {city: {type: 'string'}}, required: ['city']}

describe('FunctionSpec', () => {
  it('builds the tool declaration and the forced tool choice', () => {
    const spec = new FunctionSpec({name: 'get_weather', description: 'Current weather', jsonSchema: schema})

    expect(spec.asOpenAITool()).toEqual({
      type: 'function',
      function: {name: 'get_weather', description: 'Current weather', parameters: schema}
    })
    expect(spec.openAIToolChoice()).toEqual({type: 'function', function: {name: 'get_weather'}})
  })

  it('is frozen after construction', () => {
    const spec = new FunctionSpec({name: 'get_weather', description: '', jsonSchema: schema})
    expect(Object.isFrozen(spec)).toBe(true)
  })

  it('rejects names the API would refuse', () => {
    expect(() => new FunctionSpec({name: 'get weather', description: '', jsonSchema: schema})).toThrow(ZodError)
    expect(() => new FunctionSpec({name: '', description: '', jsonSchema: schema})).toThrow(ZodError)
  })

  it('rejects schemas that do not describe an object', () => {
    expect(() => new FunctionSpec({name: 'f', description: '', jsonSchema: {type: 'string'}})).toThrow(ZodError)
  })

  it('reads spec files using either schema key', () => {
    const snake = FunctionSpec.fromJSON({name: 'lookup', description: 'Look up', json_schema: schema})
    const camel = FunctionSpec.fromJSON({name: 'lookup', jsonSchema: schema})

    expect(snake.jsonSchema).toEqual(schema)
    expect(snake.description).toBe('Look up')
    expect(camel.jsonSchema).toEqual(schema)
    expect(camel.description).toBe('')
  })

  it('rejects spec files without a schema', () => {
    expect(() => FunctionSpec.fromJSON({name: 'lookup'})).toThrow(ZodError)
  })
})
