import { Data } from 'effect'
import type { DestinationEffect } from './feedback/destination-effect.js'

export class ConfigNotFound extends Data.TaggedError('ConfigNotFound')<{
  readonly cwd: string
  readonly searched: readonly string[]
}> {}

export class ConfigInvalid extends Data.TaggedError('ConfigInvalid')<{
  readonly path: string
  readonly message: string
}> {}

export class FeedbackNotFound extends Data.TaggedError('FeedbackNotFound')<{
  readonly name: string
  readonly available: readonly string[]
}> {}

export class SnapshotInvalid extends Data.TaggedError('SnapshotInvalid')<{
  readonly path: string
  readonly message: string
}> {}

/**
 * An action body finished without returning `success()`, `noop()` or `error()`.
 */
export class ActionResultInvalid extends Data.TaggedError('ActionResultInvalid')<{
  readonly actionName: string
  readonly returned: string
}> {
  get message() {
    return `Feedback action '${this.actionName}' must return success(), noop() or error(), but returned: ${this.returned}`
  }
}

export class EffectInvalid extends Data.TaggedError('EffectInvalid')<{
  readonly actionName: string
  readonly message: string
}> {}

/**
 * An action body failed before returning. `effects` holds what earlier actions of
 * the migration already recorded.
 */
export class ActionBodyFailed extends Data.TaggedError('ActionBodyFailed')<{
  readonly actionName: string
  readonly cause: unknown
  readonly effects: ReadonlyArray<DestinationEffect>
}> {}

/**
 * An action of a migration broke the termination contract, after earlier actions
 * recorded `effects`.
 */
export class FeedbackActionInvalid extends Data.TaggedError('FeedbackActionInvalid')<{
  readonly feedbackName: string
  readonly invalid: ActionResultInvalid
  readonly effects: ReadonlyArray<DestinationEffect>
}> {
  get message() {
    return this.invalid.message
  }
}

export class FeedbackAborted extends Data.TaggedError('FeedbackAborted')<{
  readonly feedbackName: string
  readonly actionName: string
  readonly reason: string
  readonly effects: ReadonlyArray<DestinationEffect>
}> {
  get message() {
    return `Feedback migration '${this.feedbackName}' action '${this.actionName}' returned error: ${this.reason}. Aborting execution.`
  }
}

export class FeedbackNoop extends Data.TaggedError('FeedbackNoop')<{
  readonly feedbackName: string
  readonly messages: readonly string[]
  readonly effects: ReadonlyArray<DestinationEffect>
}> {
  get message() {
    return `Feedback migration '${this.feedbackName}' was noop. Detailed messages: ${this.messages.join(', ')}`
  }
}

// Defects: these signal a bug in the caller, never a recoverable condition.

export class ActionResultNotSet extends Data.TaggedError('ActionResultNotSet')<{
  readonly actionName: string
}> {
  get message() {
    return `Result of action '${this.actionName}' read before the action finished. This is a bug.`
  }
}

export class ActionResultAlreadySet extends Data.TaggedError('ActionResultAlreadySet')<{
  readonly actionName: string
}> {
  get message() {
    return `Action '${this.actionName}' already finished. Runners are single-use.`
  }
}
