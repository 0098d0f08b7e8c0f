import { Effect } from 'effect'
import { ActionBodyFailed, ActionResultInvalid, FeedbackAborted, FeedbackActionInvalid, FeedbackNoop } from '../errors.js'
import type { FeedbackConsole } from './console.js'
import type { DestinationEffect } from './destination-effect.js'
import type { Endpoint } from './endpoint.js'
import type { ActionResult } from './result.js'
import { type ActionBody, type ActionParams, ActionRunner } from './runner.js'

export interface ActionDefinition {
  readonly name: string
  readonly params?: ActionParams | undefined
  readonly run: ActionBody<unknown>
}

export interface FeedbackDefinition {
  readonly name: string
  readonly origin: Endpoint
  readonly destination: Endpoint
  readonly actions: ReadonlyArray<ActionDefinition>
}

export interface FeedbackOutcome {
  readonly results: ReadonlyArray<{ readonly action: string; readonly result: ActionResult }>
  readonly effects: ReadonlyArray<DestinationEffect>
}

export type FeedbackError = FeedbackActionInvalid | ActionBodyFailed | FeedbackAborted | FeedbackNoop

/**
 * Run a feedback migration's actions in order for one triggering ref.
 *
 * An action returning `error()` aborts the migration. When every action returned
 * `noop()` the migration as a whole is a noop. Every failure carries the effects
 * recorded by the actions that finished before it.
 */
export const runFeedback = (
  feedback: FeedbackDefinition,
  opts: { readonly ref?: string | undefined; readonly console: FeedbackConsole },
): Effect.Effect<FeedbackOutcome, FeedbackError> =>
  Effect.gen(function*() {
    const results: Array<{ action: string; result: ActionResult }> = []
    const effects: Array<DestinationEffect> = []
    const noopMessages: Array<string> = []
    let allNoops = true

    for (const action of feedback.actions) {
      const runner = ActionRunner.make({
        feedbackName: feedback.name,
        actionName: action.name,
        ref: opts.ref,
        console: opts.console,
        origin: feedback.origin,
        destination: feedback.destination,
        params: action.params,
      })

      yield* Effect.logDebug(`running action '${action.name}'`)
      const result = yield* runner.run(action.run).pipe(
        Effect.mapError((cause) =>
          cause instanceof ActionResultInvalid
            ? new FeedbackActionInvalid({ feedbackName: feedback.name, invalid: cause, effects: [...effects] })
            : new ActionBodyFailed({ actionName: action.name, cause, effects: [...effects] })
        ),
      )
      effects.push(...runner.effects)
      results.push({ action: action.name, result })

      switch (result._tag) {
        case 'Error':
          return yield* new FeedbackAborted({
            feedbackName: feedback.name,
            actionName: action.name,
            reason: result.message,
            effects,
          })
        case 'NoOp':
          if (result.message !== undefined) noopMessages.push(result.message)
          break
        case 'Success':
          allNoops = false
          break
      }
    }

    if (allNoops) {
      return yield* new FeedbackNoop({ feedbackName: feedback.name, messages: noopMessages, effects })
    }

    return { results, effects }
  }).pipe(Effect.annotateLogs({ feedback: feedback.name }))
