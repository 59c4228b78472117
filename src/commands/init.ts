import {Command, Flags} from '@oclif/core'
import {mkdir, writeFile} from 'node:fs/promises'
import {resolve} from 'node:path'
import {getLogsDir, getRouterqHome} from '../config/paths.js'
import {DEFAULT_ROUTING, OPENROUTER_BASE_URL} from '../providers/openrouter-provider.js'

export default class Init extends Command {
  static override description = 'Initialize local project config and the global routerq home'

  static override flags = {
    force: Flags.boolean({char: 'f', description: 'overwrite existing config'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Init)
    const targetDir = process.cwd()
    const homeDir = getRouterqHome()
    const configPath = resolve(targetDir, '.routerqrc.json')
    const globalEnvExamplePath = resolve(homeDir, '.env.example')

    await mkdir(getLogsDir(homeDir), {recursive: true})
    await writeFile(
      configPath,
      JSON.stringify(
        {
          baseURL: OPENROUTER_BASE_URL,
          model: '',
          routing: DEFAULT_ROUTING,
          runtime: {maxTries: 10}
        },
        null,
        2
      ) + '\n',
      {flag: flags.force ? 'w' : 'wx'}
    )

    await writeFile(
      globalEnvExamplePath,
      'OPENROUTER_API_KEY=\nOPENROUTER_MODEL=openai/gpt-4o-mini\nOPENROUTER_BASE_URL=\n',
      {flag: flags.force ? 'w' : 'wx'}
    )

    this.log(`Created ${configPath}`)
    this.log(`Created ${globalEnvExamplePath}`)
  }
}
