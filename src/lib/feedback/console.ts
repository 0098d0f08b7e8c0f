import { Console, Effect } from 'effect'
import { symbols } from '../ui/symbols.js'

/**
 * Line-oriented reporting sink handed to actions and endpoints.
 */
export interface FeedbackConsole {
  readonly info: (message: string) => Effect.Effect<void>
  readonly warn: (message: string) => Effect.Effect<void>
  readonly error: (message: string) => Effect.Effect<void>
}

export type Severity = 'info' | 'warn' | 'error'

export interface ConsoleLine {
  readonly severity: Severity
  readonly message: string
}

export const terminalConsole: FeedbackConsole = {
  info: (message) => Console.log(`  ${symbols.info} ${message}`),
  warn: (message) => Console.log(`  ${symbols.warn} ${message}`),
  error: (message) => Console.error(`  ${symbols.fail} ${message}`),
}

export const logConsole: FeedbackConsole = {
  info: (message) => Effect.logInfo(message),
  warn: (message) => Effect.logWarning(message),
  error: (message) => Effect.logError(message),
}

/**
 * Console that keeps every line in memory, in emission order.
 */
export const makeMemoryConsole = (): FeedbackConsole & { readonly lines: ReadonlyArray<ConsoleLine> } => {
  const lines: Array<ConsoleLine> = []
  const push = (severity: Severity) => (message: string) =>
    Effect.sync(() => {
      lines.push({ severity, message })
    })
  return { lines, info: push('info'), warn: push('warn'), error: push('error') }
}
