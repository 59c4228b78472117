import {Args, Command, Flags} from '@oclif/core'
import {loadConfig} from '../config/load-config.js'
import {formatEventLine} from '../core/event-lines.js'
import {InMemoryEventBus} from '../core/event-bus.js'
import {runQuery} from '../core/query-runner.js'
import {QueryLogSubscriber} from '../core/subscribers/query-log-subscriber.js'
import {errorMessage} from '../providers/errors.js'
import type {QueryEvent} from '../providers/types.js'

export default class Query extends Command {
  static override description = 'Send one chat completion to OpenRouter and print the normalized result'

  static override examples = [
    '<%= config.bin %> <%= command.id %> "Summarize the plot of Hamlet"',
    '<%= config.bin %> <%= command.id %> --system "Answer in JSON" --func-spec ./lookup.json "Find the capital of France"'
  ]

  static override flags = {
    system: Flags.string({char: 's', description: 'system message, sent with the user role'}),
    'func-spec': Flags.string({char: 'f', description: 'path to a JSON function spec; forces a tool call'}),
    model: Flags.string({char: 'm', description: 'model id, e.g. openai/gpt-4o-mini'}),
    temperature: Flags.string({char: 't', description: 'sampling temperature'}),
    'max-tokens': Flags.integer({description: 'completion token limit'}),
    json: Flags.boolean({description: 'print the whole result record as JSON'}),
    quiet: Flags.boolean({char: 'q', description: 'hide request logs'})
  }

  static override args = {
    message: Args.string({description: 'user message'})
  }

  public async run(): Promise<void> {
    const {args, flags} = await this.parse(Query)
    if (!args.message && !flags.system) {
      this.error('Provide a user message or --system.', {exit: 2})
    }

    const temperature = flags.temperature === undefined ? undefined : Number(flags.temperature)
    if (temperature !== undefined && !Number.isFinite(temperature)) {
      this.error(`Invalid --temperature: ${flags.temperature}`, {exit: 2})
    }

    const config = await loadConfig()
    const bus = new InMemoryEventBus<QueryEvent>((error) => {
      this.warn(`event handler failed: ${errorMessage(error)}`)
    })
    const logSubscriber = new QueryLogSubscriber(config.logFile)
    const unsubscribeLog = bus.subscribe((event) => {
      void logSubscriber.handle(event).catch((error: unknown) => {
        this.warn(`could not write ${config.logFile}: ${errorMessage(error)}`)
      })
    })
    const unsubscribe = flags.quiet
      ? () => {}
      : bus.subscribe((event) => {
          // stdout carries only the result.
          this.logToStderr(formatEventLine(event))
        })

    try {
      const result = await runQuery({
        config,
        bus,
        systemMessage: flags.system,
        userMessage: args.message,
        funcSpecPath: flags['func-spec'],
        model: flags.model,
        params: {temperature, max_tokens: flags['max-tokens']}
      })

      if (flags.json) {
        this.log(JSON.stringify(result, null, 2))
        return
      }

      if (typeof result.output === 'string') this.log(result.output)
      else if (result.output !== null) this.log(JSON.stringify(result.output, null, 2))
    } finally {
      unsubscribe()
      unsubscribeLog()
      await logSubscriber.flush()
    }
  }
}
