import {homedir} from 'node:os'
import {resolve} from 'node:path'

export function getRouterqHome(): string {
  const custom = process.env.ROUTERQ_HOME?.trim()
  if (custom) return resolve(custom)
  return resolve(homedir(), '.routerq')
}

export function getGlobalEnvPath(): string {
  return resolve(getRouterqHome(), '.env')
}

export function getLogsDir(homeDir = getRouterqHome()): string {
  return resolve(homeDir, 'logs')
}

export function getQueryLogPath(homeDir = getRouterqHome()): string {
  return resolve(getLogsDir(homeDir), 'queries.jsonl')
}
