import { Schema } from 'effect'

export const EffectType = Schema.Literal(
  'Created',
  'Updated',
  'NoOp',
  'InsufficientApprovals',
  'Error',
  'TemporaryError',
  'Started',
)
export type EffectType = typeof EffectType.Type

/** An origin reference that caused an effect, e.g. a commit or a change number. */
export class OriginRef extends Schema.TaggedClass<OriginRef>('OriginRef')('OriginRef', {
  ref: Schema.NonEmptyString,
}) {}

/** The destination entity an effect touched, e.g. a pull request or a commit. */
export class DestinationRef extends Schema.TaggedClass<DestinationRef>('DestinationRef')('DestinationRef', {
  id: Schema.NonEmptyString,
  type: Schema.NonEmptyString,
  url: Schema.optional(Schema.String),
}) {}

/**
 * Audit record of one change an action made on a destination.
 */
export class DestinationEffect extends Schema.TaggedClass<DestinationEffect>('DestinationEffect')(
  'DestinationEffect',
  {
    type: EffectType,
    summary: Schema.NonEmptyString,
    originRefs: Schema.optionalWith(Schema.Array(OriginRef), { default: () => [] }),
    destinationRef: DestinationRef,
    errors: Schema.optionalWith(Schema.Array(Schema.String), { default: () => [] }),
  },
) {
  static is = Schema.is(DestinationEffect)
}
