import { HashMap, Option, pipe } from 'effect'
import { NamedReference, RefDiff, type RefSnapshot, RefUpdate } from './entities.js'

/**
 * Classify how references moved between two snapshots.
 *
 * This is a set comparison keyed by reference name, not a sequence diff: names
 * present in both snapshots at the same revision appear in none of the results.
 */
export const diffRefs = (before: RefSnapshot, after: RefSnapshot): RefDiff => {
  const deleted = HashMap.filter(before, (_, name) => !HashMap.has(after, name))
  const inserted = HashMap.filter(after, (_, name) => !HashMap.has(before, name))
  const updated = HashMap.filterMap(before, (previous, name) =>
    pipe(
      HashMap.get(after, name),
      Option.filter((next) => !NamedReference.Equivalence(previous, next)),
      Option.map((next) => new RefUpdate({ before: previous, after: next })),
    ))

  return new RefDiff({ deleted, inserted, updated })
}
