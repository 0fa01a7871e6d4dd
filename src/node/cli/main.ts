import { log } from '../../shared/logger'
import { loadEnvFile } from '../core/config'
import { BRANCH_FORMAT } from '../shared/constants'
import { runCli } from './run'

export async function main(): Promise<void> {
  try {
    loadEnvFile()
    if (process.stdin.isTTY) {
      log.warn(`Reading branch records from stdin. Pipe in: git branch --format='${BRANCH_FORMAT}'`)
    }
    process.exitCode = await runCli(process.argv.slice(2), {
      stdin: process.stdin,
      stdout: process.stdout,
      isTTY: process.stdout.isTTY === true,
      env: process.env
    })
  } catch (error) {
    log.error('Error running git-br:', error)
    process.exitCode = 1
  }
}

void main()
