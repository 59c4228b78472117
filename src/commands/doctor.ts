import {Command, Flags} from '@oclif/core'
import {loadConfig} from '../config/load-config.js'
import {collectDiagnostics, describeRouting} from '../core/diagnostics.js'

export default class Doctor extends Command {
  static override description = 'Check the API key, routing and retry budget; --json also prints the resolved config'

  static override flags = {
    json: Flags.boolean({description: 'print the full report, resolved config included, as JSON'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Doctor)
    const report = collectDiagnostics(await loadConfig())

    if (flags.json) {
      this.log(JSON.stringify({version: this.config.pjson.version, ...report}, null, 2))
      return
    }

    this.log(`routerq ${this.config.pjson.version} on node ${report.node}`)
    this.log(`endpoint: POST ${report.endpoint}`)
    this.log(`model: ${report.model}`)
    this.log(`routing: ${describeRouting(report.routing)}`)
    this.log(
      `retries: up to ${report.retry.maxTries} attempts, at most ${(report.retry.worstCaseWaitMs / 1000).toFixed(1)}s of backoff, ${report.retry.timeoutMs}ms per request`
    )
    for (const [name, {path, exists}] of Object.entries(report.files)) {
      this.log(`${name}: ${path}${exists ? '' : ' (missing)'}`)
    }

    if (report.apiKey === 'missing') {
      this.warn('OPENROUTER_API_KEY is not set; every query will fail with an authentication error.')
    }
  }
}
