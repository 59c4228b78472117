import {z} from 'zod'
import type {ChatCompletionNamedToolChoice, ChatCompletionTool} from 'openai/resources/chat/completions'

const functionSpecSchema = z.object({
  name: z.string().regex(/^[a-zA-Z0-9_-]{1,64}$/, 'function name must be 1-64 letters, digits, _ or -'),
  jsonSchema: z.object({type: z.literal('object')}).passthrough(),
  description: z.string()
})

const functionSpecFileSchema = z.object({
  name: z.string(),
  description: z.string().default(''),
  jsonSchema: z.record(z.string(), z.unknown()).optional(),
  json_schema: z.record(z.string(), z.unknown()).optional()
})

export type FunctionSpecInit = {
  name: string
  jsonSchema: Record<string, unknown>
  description: string
}

/**
 * A single callable tool the model is forced to answer through. The schema
 * becomes the tool's `parameters`, so the tool call arguments follow it.
 */
export class FunctionSpec {
  readonly name: string
  readonly jsonSchema: Record<string, unknown>
  readonly description: string

  constructor(init: FunctionSpecInit) {
    const parsed = functionSpecSchema.parse(init)
    this.name = parsed.name
    this.jsonSchema = parsed.jsonSchema
    this.description = parsed.description
    Object.freeze(this)
  }

  /** Accepts `json_schema` as well as `jsonSchema`, for spec files shared with other tools. */
  static fromJSON(value: unknown): FunctionSpec {
    const parsed = functionSpecFileSchema.parse(value)
    return new FunctionSpec({
      name: parsed.name,
      description: parsed.description,
      jsonSchema: parsed.jsonSchema ?? parsed.json_schema ?? {}
    })
  }

  asOpenAITool(): ChatCompletionTool {
    return {
      type: 'function',
      function: {
        name: this.name,
        description: this.description,
        parameters: this.jsonSchema
      }
    }
  }

  openAIToolChoice(): ChatCompletionNamedToolChoice {
    return {type: 'function', function: {name: this.name}}
  }
}
