import { Equivalence, HashMap, Schema } from 'effect'

/**
 * A reference name resolved to a revision, e.g. `refs/heads/main` at `4f2a91c`.
 */
export class NamedReference extends Schema.TaggedClass<NamedReference>('NamedReference')(
  'NamedReference',
  {
    name: Schema.String,
    revision: Schema.NonEmptyString,
  },
) {
  static is = Schema.is(NamedReference)

  /**
   * References point at the same content iff their revisions match. The name is
   * display-only: `main` and `refs/heads/main` at one revision are equal.
   */
  static Equivalence: Equivalence.Equivalence<NamedReference> = Equivalence.mapInput(
    Equivalence.string,
    (ref: NamedReference) => ref.revision,
  )
}

export type RefSnapshot = HashMap.HashMap<string, NamedReference>

/**
 * Build a snapshot from a `name -> revision` record.
 */
export const makeSnapshot = (revisions: Readonly<Record<string, string>>): RefSnapshot =>
  HashMap.fromIterable(
    Object.entries(revisions).map(([name, revision]) => [name, new NamedReference({ name, revision })] as const),
  )

export class RefUpdate extends Schema.TaggedClass<RefUpdate>('RefUpdate')(
  'RefUpdate',
  Schema.Struct({
    before: NamedReference,
    after: NamedReference,
  }).pipe(
    Schema.filter(({ after, before }) =>
      !NamedReference.Equivalence(before, after) || `${before.name} did not move from ${before.revision}`
    ),
  ),
) {
  static is = Schema.is(RefUpdate)

  get description(): string {
    return `${this.before.revision} -> ${this.after.revision}`
  }
}

export class RefDiff extends Schema.TaggedClass<RefDiff>('RefDiff')('RefDiff', {
  deleted: Schema.HashMapFromSelf({ key: Schema.String, value: NamedReference }),
  inserted: Schema.HashMapFromSelf({ key: Schema.String, value: NamedReference }),
  updated: Schema.HashMapFromSelf({ key: Schema.String, value: RefUpdate }),
}) {
  static is = Schema.is(RefDiff)

  get isEmpty(): boolean {
    return HashMap.isEmpty(this.deleted) && HashMap.isEmpty(this.inserted) && HashMap.isEmpty(this.updated)
  }
}
