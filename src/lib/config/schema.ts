import { Predicate, Schema } from 'effect'
import type { Endpoint } from '../feedback/endpoint.js'
import type { FeedbackDefinition } from '../feedback/migration.js'
import type { ActionBody } from '../feedback/runner.js'

const EndpointSchema = Schema.declare(
  (u: unknown): u is Endpoint =>
    Predicate.hasProperty(u, 'type') && Predicate.isString(u.type)
    && Predicate.hasProperty(u, 'withConsole') && Predicate.isFunction(u.withConsole),
  { identifier: 'Endpoint', description: 'an object with a string `type` and a `withConsole` method' },
)

const ActionBodySchema = Schema.declare(
  (u: unknown): u is ActionBody<unknown> => Predicate.isFunction(u),
  { identifier: 'ActionBody', description: 'a function taking the action runner and returning an Effect' },
)

export const ConsoleKind = Schema.Literal('terminal', 'log')
export type ConsoleKind = typeof ConsoleKind.Type

export const FeedbackAction = Schema.Struct({
  name: Schema.NonEmptyString,
  params: Schema.optional(Schema.Record({ key: Schema.String, value: Schema.Unknown })),
  run: ActionBodySchema,
})
export type FeedbackAction = typeof FeedbackAction.Type

export const Feedback = Schema.Struct({
  name: Schema.NonEmptyString,
  origin: EndpointSchema,
  destination: EndpointSchema,
  actions: Schema.NonEmptyArray(FeedbackAction),
})
export type Feedback = typeof Feedback.Type

export const Config = Schema.Struct({
  console: Schema.optional(ConsoleKind),
  feedbacks: Schema.optional(Schema.Array(Feedback)),
})
export type Config = typeof Config.Type

export interface ResolvedConfig {
  readonly console: ConsoleKind
  readonly feedbacks: readonly FeedbackDefinition[]
}

export function defineConfig(config: Config): Config {
  return config
}

export function resolveDefaults(config: Config): ResolvedConfig {
  return {
    console: config.console ?? 'terminal',
    feedbacks: config.feedbacks ?? [],
  }
}
