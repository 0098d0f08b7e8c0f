import type { FeedbackConsole } from './console.js'

/**
 * Handle on an origin or destination system. Implementations live outside this
 * package and own their connection state.
 */
export interface Endpoint {
  readonly type: string
  /** Same endpoint, reporting to `console`. */
  withConsole(console: FeedbackConsole): Endpoint
}
