import { appendFileSync, mkdirSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'

export type DebugEvent = { event: string } & Record<string, unknown>

export const isDebugEnabled = (): boolean =>
  process.env.DIAGDIFF_DEBUG === 'true' || process.env.DIAGDIFF_DEBUG === '1'

// Debug logging - only enabled when DIAGDIFF_DEBUG environment variable is set
export const debugLog = (message: DebugEvent): void => {
  if (!isDebugEnabled()) return

  const diagdiffDir = join(homedir(), '.diagdiff')
  const logPath = join(diagdiffDir, 'debug.log')

  // Ensure directory exists
  mkdirSync(diagdiffDir, { recursive: true })

  appendFileSync(logPath, `${new Date().toISOString()} - ${JSON.stringify(message)}\n`)
}
