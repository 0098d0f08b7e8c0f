import { it } from '@effect/vitest'
import { Cause, Effect, Exit, Option } from 'effect'
import { describe, expect } from 'vitest'
import { ActionResultAlreadySet, ActionResultNotSet } from '../errors.js'
import { type FeedbackConsole, makeMemoryConsole } from './console.js'
import { DestinationRef, OriginRef } from './destination-effect.js'
import type { Endpoint } from './endpoint.js'
import { ActionRunner, type ActionInvocation } from './runner.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

class FakeEndpoint implements Endpoint {
  constructor(
    readonly type: string,
    readonly console?: FeedbackConsole,
  ) {}

  withConsole(console: FeedbackConsole): Endpoint {
    return new FakeEndpoint(this.type, console)
  }
}

const pr = (id: string) => new DestinationRef({ id, type: 'pull_request' })

const makeRunner = (overrides: Partial<ActionInvocation> = {}) => {
  const console = makeMemoryConsole()
  const runner = ActionRunner.make({
    feedbackName: 'sync-back',
    actionName: 'label_pr',
    ref: 'refs/heads/main',
    console,
    origin: new FakeEndpoint('git.origin'),
    destination: new FakeEndpoint('github.destination'),
    ...overrides,
  })
  return { runner, console }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('ActionRunner', () => {
  describe('identity', () => {
    it('exposes the invocation it was made with', () => {
      const { runner, console } = makeRunner({ params: { label: 'synced' } })
      expect(runner.feedbackName).toBe('sync-back')
      expect(runner.actionName).toBe('label_pr')
      expect(runner.ref).toEqual(Option.some('refs/heads/main'))
      expect(runner.console).toBe(console)
      expect(runner.params).toEqual({ label: 'synced' })
    })

    it('reports a missing ref as none', () => {
      const { runner } = makeRunner({ ref: undefined })
      expect(Option.isNone(runner.ref)).toBe(true)
    })

    it('binds endpoints to the active console', () => {
      const { runner, console } = makeRunner()
      const origin = runner.origin
      const destination = runner.destination
      expect(origin.type).toBe('git.origin')
      expect(destination.type).toBe('github.destination')
      expect(origin instanceof FakeEndpoint && origin.console === console).toBe(true)
      expect(destination instanceof FakeEndpoint && destination.console === console).toBe(true)
    })
  })

  describe('termination contract', () => {
    it.effect('returns success and reports it', () =>
      Effect.gen(function*() {
        const { runner, console } = makeRunner()
        const result = yield* runner.run((ctx) => Effect.succeed(ctx.success()))
        expect(result._tag).toBe('Success')
        expect(runner.getActionResult()).toBe(result)
        expect(console.lines).toEqual([{ severity: 'info', message: "Action 'label_pr' returned success" }])
      }))

    it.effect('reports noop with its message', () =>
      Effect.gen(function*() {
        const { runner, console } = makeRunner()
        const result = yield* runner.run((ctx) => Effect.succeed(ctx.noop('already labeled')))
        expect(result._tag).toBe('NoOp')
        expect(console.lines).toEqual([
          { severity: 'info', message: "Action 'label_pr' returned noop: already labeled" },
        ])
      }))

    it.effect('reports noop without a message', () =>
      Effect.gen(function*() {
        const { runner, console } = makeRunner()
        yield* runner.run((ctx) => Effect.succeed(ctx.noop()))
        expect(console.lines).toEqual([{ severity: 'info', message: "Action 'label_pr' returned noop" }])
      }))

    it.effect('reports error results at error severity', () =>
      Effect.gen(function*() {
        const { runner, console } = makeRunner()
        const result = yield* runner.run((ctx) => Effect.succeed(ctx.error('label missing')))
        expect(result._tag).toBe('Error')
        expect(console.lines).toEqual([
          { severity: 'error', message: "Action 'label_pr' returned error: label missing" },
        ])
      }))

    it.effect('fails validation when nothing is returned', () =>
      Effect.gen(function*() {
        const { runner, console } = makeRunner()
        const error = yield* Effect.flip(runner.run(() => Effect.void))
        expect(error._tag).toBe('ActionResultInvalid')
        expect(error.actionName).toBe('label_pr')
        expect(error.returned).toBe('no result returned')
        expect(error.message).toBe(
          "Feedback action 'label_pr' must return success(), noop() or error(), but returned: no result returned",
        )
        expect(console.lines).toEqual([])
      }))

    it.effect('fails validation naming the offending value', () =>
      Effect.gen(function*() {
        const { runner } = makeRunner()
        const error = yield* Effect.flip(runner.run(() => Effect.succeed(42)))
        expect(error._tag).toBe('ActionResultInvalid')
        expect(error.returned).toBe('42')
      }))

    it.effect('does not accept a look-alike result object', () =>
      Effect.gen(function*() {
        const { runner } = makeRunner()
        const error = yield* Effect.flip(runner.run(() => Effect.succeed({ _tag: 'Success' })))
        expect(error._tag).toBe('ActionResultInvalid')
        expect(error.returned).toBe('{"_tag":"Success"}')
      }))

    it.effect('names a returned function instead of printing its source', () =>
      Effect.gen(function*() {
        const { runner } = makeRunner()
        function labelPr() {
          return 'labelled'
        }
        const named = yield* Effect.flip(runner.run(() => Effect.succeed(labelPr)))
        expect(named.returned).toBe('function labelPr')
        const anonymous = yield* Effect.flip(runner.run(() => Effect.succeed(() => 1)))
        expect(anonymous.returned).toBe('anonymous function')
      }))

    it.effect('falls back to String when an object serializes to nothing', () =>
      Effect.gen(function*() {
        const { runner } = makeRunner()
        const error = yield* Effect.flip(runner.run(() => Effect.succeed({ toJSON: () => undefined })))
        expect(error.returned).toBe('[object Object]')
      }))

    it.effect('passes body failures through unchanged', () =>
      Effect.gen(function*() {
        const { runner } = makeRunner()
        const error = yield* Effect.flip(runner.run(() => Effect.fail('endpoint unreachable')))
        expect(error).toBe('endpoint unreachable')
      }))
  })

  describe('result', () => {
    it('throws when read before the action finished', () => {
      const { runner } = makeRunner()
      expect(() => runner.getActionResult()).toThrow(ActionResultNotSet)
    })

    it('stays unset after a validation failure', async () => {
      const { runner } = makeRunner()
      await Effect.runPromise(Effect.either(runner.run(() => Effect.succeed('done'))))
      expect(() => runner.getActionResult()).toThrow(ActionResultNotSet)
    })

    it.effect('dies when finished a second time', () =>
      Effect.gen(function*() {
        const { runner } = makeRunner()
        yield* runner.run((ctx) => Effect.succeed(ctx.success()))
        const exit = yield* Effect.exit(runner.finish(runner.success(), runner.withParams({})))
        expect(Exit.isFailure(exit)).toBe(true)
        if (Exit.isFailure(exit)) {
          const defect = Option.getOrUndefined(Cause.dieOption(exit.cause))
          expect(defect).toBeInstanceOf(ActionResultAlreadySet)
        }
      }))
  })

  describe('effects', () => {
    it.effect('records updated effects in order', () =>
      Effect.gen(function*() {
        const { runner } = makeRunner()
        yield* runner.run((ctx) =>
          Effect.gen(function*() {
            yield* ctx.recordEffect({ summary: 'first', originRefs: [new OriginRef({ ref: 'c1' })], destinationRef: pr('1') })
            yield* ctx.recordEffect({ summary: 'second', destinationRef: pr('2'), errors: ['rate limited'] })
            return ctx.success()
          })
        )
        expect(runner.effects.map((e) => e.summary)).toEqual(['first', 'second'])
        expect(runner.effects.map((e) => e.type)).toEqual(['Updated', 'Updated'])
        expect(runner.effects[0]?.originRefs.map((o) => o.ref)).toEqual(['c1'])
        expect(runner.effects[1]?.errors).toEqual(['rate limited'])
      }))

    it.effect('fails with EffectInvalid on an empty summary', () =>
      Effect.gen(function*() {
        const { runner } = makeRunner()
        const error = yield* Effect.flip(runner.recordEffect({ summary: '', destinationRef: pr('1') }))
        expect(error._tag).toBe('EffectInvalid')
        expect(error.actionName).toBe('label_pr')
        expect(runner.effects).toEqual([])
      }))

    it.effect('drops effects of a body that failed validation', () =>
      Effect.gen(function*() {
        const { runner } = makeRunner()
        yield* Effect.either(runner.run((ctx) =>
          Effect.gen(function*() {
            yield* ctx.recordEffect({ summary: 'orphan', destinationRef: pr('1') })
            return 'done'
          })
        ))
        expect(runner.effects).toEqual([])
      }))

    it.effect('appends delegated effects after the direct ones recorded before the call', () =>
      Effect.gen(function*() {
        const { runner } = makeRunner()
        const result = yield* runner.run((ctx) =>
          Effect.gen(function*() {
            yield* ctx.recordEffect({ summary: 'direct-1', destinationRef: pr('1') })
            yield* ctx.recordEffect({ summary: 'direct-2', destinationRef: pr('2') })
            return yield* ctx.delegate({ label: 'child' }, (child) =>
              Effect.gen(function*() {
                yield* child.recordEffect({ summary: 'child-1', destinationRef: pr('3') })
                return child.success()
              }))
          })
        )
        expect(result._tag).toBe('Success')
        expect(runner.effects.map((e) => e.summary)).toEqual(['direct-1', 'direct-2', 'child-1'])
      }))

    it.effect('places direct effects recorded after a delegation behind the child ones', () =>
      Effect.gen(function*() {
        const { runner } = makeRunner()
        yield* runner.run((ctx) =>
          Effect.gen(function*() {
            yield* ctx.delegate({ label: 'child' }, (child) =>
              Effect.gen(function*() {
                yield* child.recordEffect({ summary: 'child', destinationRef: pr('1') })
                return child.success()
              }))
            yield* ctx.recordEffect({ summary: 'direct', destinationRef: pr('2') })
            return ctx.success()
          })
        )
        expect(runner.effects.map((e) => e.summary)).toEqual(['child', 'direct'])
      }))

    it.effect('surfaces effects from any delegation depth', () =>
      Effect.gen(function*() {
        const { runner } = makeRunner()
        yield* runner.run((ctx) =>
          ctx.delegate({ depth: 1 }, (first) =>
            Effect.gen(function*() {
              yield* first.recordEffect({ summary: 'depth-1', destinationRef: pr('1') })
              yield* first.delegate({ depth: 2 }, (second) =>
                Effect.gen(function*() {
                  yield* second.recordEffect({ summary: 'depth-2', destinationRef: pr('2') })
                  return second.noop()
                }))
              return first.success()
            }))
        )
        expect(runner.effects.map((e) => e.summary)).toEqual(['depth-1', 'depth-2'])
      }))
  })

  describe('withParams', () => {
    it.effect('keeps identity and starts with no effects', () =>
      Effect.gen(function*() {
        const { runner, console } = makeRunner({ params: { label: 'a' } })
        yield* runner.recordEffect({ summary: 'parent', destinationRef: pr('1') })

        const child = runner.withParams({ label: 'b' })

        expect(child.params).toEqual({ label: 'b' })
        expect(child.feedbackName).toBe('sync-back')
        expect(child.actionName).toBe('label_pr')
        expect(child.ref).toEqual(Option.some('refs/heads/main'))
        expect(child.console).toBe(console)
        expect(child.effects).toEqual([])
        expect(() => child.getActionResult()).toThrow(ActionResultNotSet)
        expect(runner.params).toEqual({ label: 'a' })
      }))

    it.effect('hands the current params to the body', () =>
      Effect.gen(function*() {
        const { runner } = makeRunner({ params: { label: 'synced' } })
        let seen: unknown
        yield* runner.run((ctx) =>
          Effect.sync(() => {
            seen = ctx.params['label']
            return ctx.success()
          })
        )
        expect(seen).toBe('synced')
      }))
  })

  describe('absorb', () => {
    it.effect('appends the child effects after the existing ones', () =>
      Effect.gen(function*() {
        const { runner } = makeRunner()
        const child = runner.withParams({})
        yield* runner.recordEffect({ summary: 'parent', destinationRef: pr('1') })
        yield* child.recordEffect({ summary: 'child-a', destinationRef: pr('2') })
        yield* child.recordEffect({ summary: 'child-b', destinationRef: pr('3') })

        runner.absorb(child)

        expect(runner.effects.map((e) => e.summary)).toEqual(['parent', 'child-a', 'child-b'])
        expect(child.effects.map((e) => e.summary)).toEqual(['child-a', 'child-b'])
      }))
  })
})
