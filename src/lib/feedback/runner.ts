import { Effect, Option } from 'effect'
import { ActionResultAlreadySet, ActionResultInvalid, ActionResultNotSet, EffectInvalid } from '../errors.js'
import type { FeedbackConsole } from './console.js'
import { DestinationEffect, type DestinationRef, type OriginRef } from './destination-effect.js'
import type { Endpoint } from './endpoint.js'
import * as Results from './result.js'
import { type ActionResult, isActionResult } from './result.js'

export type ActionParams = Readonly<Record<string, unknown>>

/**
 * User-authored reaction to a migration event. It must finish with one of the
 * runner's `success()`, `noop()` or `error()` results.
 */
export type ActionBody<E = never, R = never> = (context: ActionRunner) => Effect.Effect<unknown, E, R>

export interface ActionInvocation {
  readonly feedbackName: string
  readonly actionName: string
  readonly ref?: string | undefined
  readonly console: FeedbackConsole
  readonly origin: Endpoint
  readonly destination: Endpoint
  readonly params?: ActionParams | undefined
}

export interface EffectInput {
  readonly summary: string
  readonly originRefs?: ReadonlyArray<OriginRef> | undefined
  readonly destinationRef: DestinationRef
  readonly errors?: ReadonlyArray<string> | undefined
}

const describeReturned = (returned: unknown): string => {
  if (returned === undefined || returned === null) return 'no result returned'
  if (typeof returned === 'string') return `'${returned}'`
  if (typeof returned === 'function') return returned.name === '' ? 'anonymous function' : `function ${returned.name}`
  if (typeof returned === 'object') {
    try {
      return JSON.stringify(returned) ?? String(returned)
    } catch {
      return String(returned)
    }
  }
  return String(returned)
}

/**
 * State and orchestration for one execution of one feedback action.
 *
 * A runner is single-use: its result is written once by {@link ActionRunner.finish}.
 * Effects recorded on child runners (see {@link ActionRunner.withParams}) reach the
 * parent only through {@link ActionRunner.absorb}, which `run` and `delegate` call
 * after the child's body has returned.
 */
export class ActionRunner {
  private readonly recorded: Array<DestinationEffect> = []
  private result: Option.Option<ActionResult> = Option.none()

  private constructor(
    private readonly invocation: ActionInvocation,
    readonly params: ActionParams,
  ) {}

  static make(invocation: ActionInvocation): ActionRunner {
    return new ActionRunner(invocation, invocation.params ?? {})
  }

  get feedbackName(): string {
    return this.invocation.feedbackName
  }

  get actionName(): string {
    return this.invocation.actionName
  }

  /** What triggered the event, when known. */
  get ref(): Option.Option<string> {
    return Option.fromNullable(this.invocation.ref)
  }

  get console(): FeedbackConsole {
    return this.invocation.console
  }

  get origin(): Endpoint {
    return this.invocation.origin.withConsole(this.console)
  }

  get destination(): Endpoint {
    return this.invocation.destination.withConsole(this.console)
  }

  get effects(): ReadonlyArray<DestinationEffect> {
    return [...this.recorded]
  }

  success(): ActionResult {
    return Results.success()
  }

  noop(message?: string): ActionResult {
    return Results.noop(message)
  }

  error(message: string): ActionResult {
    return Results.error(message)
  }

  recordEffect(input: EffectInput): Effect.Effect<DestinationEffect, EffectInvalid> {
    return Effect.try({
      try: () =>
        new DestinationEffect({
          type: 'Updated',
          summary: input.summary,
          originRefs: input.originRefs ?? [],
          destinationRef: input.destinationRef,
          errors: input.errors ?? [],
        }),
      catch: (e) => new EffectInvalid({ actionName: this.actionName, message: e instanceof Error ? e.message : String(e) }),
    }).pipe(Effect.tap((effect) => Effect.sync(() => this.recorded.push(effect))))
  }

  /**
   * Child runner with the same identity, ref, console and endpoints, bound to
   * `params`. It starts with no effects and no result.
   */
  withParams(params: ActionParams): ActionRunner {
    return new ActionRunner(this.invocation, params)
  }

  /** Append `child`'s effects, in recording order. */
  absorb(child: ActionRunner): void {
    this.recorded.push(...child.recorded)
  }

  getActionResult(): ActionResult {
    return Option.getOrThrowWith(this.result, () => new ActionResultNotSet({ actionName: this.actionName }))
  }

  /**
   * Enforce the termination contract on what an action body returned, report the
   * outcome and collect the effects recorded on `context`.
   */
  finish(returned: unknown, context: ActionRunner): Effect.Effect<ActionResult, ActionResultInvalid> {
    return Effect.gen(this, function*() {
      if (!isActionResult(returned)) {
        return yield* new ActionResultInvalid({
          actionName: this.actionName,
          returned: describeReturned(returned),
        })
      }
      if (Option.isSome(this.result)) {
        return yield* Effect.die(new ActionResultAlreadySet({ actionName: this.actionName }))
      }
      this.result = Option.some(returned)

      switch (returned._tag) {
        case 'Success':
          yield* this.console.info(`Action '${this.actionName}' returned success`)
          break
        case 'NoOp':
          yield* this.console.info(
            returned.message === undefined
              ? `Action '${this.actionName}' returned noop`
              : `Action '${this.actionName}' returned noop: ${returned.message}`,
          )
          break
        case 'Error':
          yield* this.console.error(`Action '${this.actionName}' returned error: ${returned.message}`)
          break
      }

      if (context !== this) {
        this.absorb(context)
        yield* Effect.logDebug(`absorbed ${context.recorded.length} effect(s)`)
      }
      return returned
    })
  }

  /** Run `body` against a child bound to the current params. */
  run<E, R>(body: ActionBody<E, R>): Effect.Effect<ActionResult, E | ActionResultInvalid, R> {
    return Effect.gen(this, function*() {
      const context = this.withParams(this.params)
      const returned = yield* body(context)
      return yield* this.finish(returned, context)
    }).pipe(Effect.annotateLogs({ feedback: this.feedbackName, action: this.actionName }))
  }

  /**
   * Run `body` through a child bound to `params`, then absorb the child's effects.
   * They land after whatever this runner recorded before the call and ahead of
   * anything recorded after it. Returns the child's result; this runner's own result
   * is untouched.
   */
  delegate<E, R>(params: ActionParams, body: ActionBody<E, R>): Effect.Effect<ActionResult, E | ActionResultInvalid, R> {
    return Effect.gen(this, function*() {
      const child = this.withParams(params)
      const result = yield* child.run(body)
      this.absorb(child)
      return result
    })
  }
}
