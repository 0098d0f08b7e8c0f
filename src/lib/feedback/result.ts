import { Schema } from 'effect'

export class ActionSuccess extends Schema.TaggedClass<ActionSuccess>('ActionSuccess')('Success', {}) {}

export class ActionNoOp extends Schema.TaggedClass<ActionNoOp>('ActionNoOp')('NoOp', {
  message: Schema.optional(Schema.String),
}) {}

export class ActionError extends Schema.TaggedClass<ActionError>('ActionError')('Error', {
  message: Schema.String,
}) {}

export const ActionResult = Schema.Union(ActionSuccess, ActionNoOp, ActionError)
export type ActionResult = typeof ActionResult.Type

/**
 * Only values built by {@link success}, {@link noop} or {@link error} pass; a plain
 * object carrying the same `_tag` does not.
 */
export const isActionResult = Schema.is(ActionResult)

export const success = (): ActionResult => new ActionSuccess()

export const noop = (message?: string): ActionResult => new ActionNoOp(message === undefined ? {} : { message })

export const error = (message: string): ActionResult => new ActionError({ message })
