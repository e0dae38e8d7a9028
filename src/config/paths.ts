import {homedir} from 'node:os'
import {resolve} from 'node:path'

export function getPolyllmHome(): string {
  const custom = process.env.POLYLLM_HOME?.trim()
  if (custom) return resolve(custom)
  return resolve(homedir(), '.polyllm')
}

export function getGlobalEnvPath(homeDir = getPolyllmHome()): string {
  return resolve(homeDir, '.env')
}

export function getLogsDir(homeDir = getPolyllmHome()): string {
  return resolve(homeDir, 'logs')
}

export function getLogPath(homeDir = getPolyllmHome()): string {
  return resolve(getLogsDir(homeDir), 'polyllm.jsonl')
}
