import { FileSystem } from '@effect/platform'
import { Effect, Schema } from 'effect'
import { SnapshotInvalid } from '../errors.js'
import { makeSnapshot, type RefSnapshot } from './entities.js'

const SnapshotFile = Schema.parseJson(
  Schema.Record({ key: Schema.String, value: Schema.NonEmptyString }),
)

/**
 * Read a snapshot from a JSON file mapping reference names to revisions.
 */
export const loadSnapshot = (
  path: string,
): Effect.Effect<RefSnapshot, SnapshotInvalid, FileSystem.FileSystem> =>
  Effect.gen(function*() {
    const fs = yield* FileSystem.FileSystem
    const raw = yield* fs.readFileString(path).pipe(
      Effect.mapError((e) => new SnapshotInvalid({ path, message: e.message })),
    )
    const revisions = yield* Schema.decode(SnapshotFile)(raw).pipe(
      Effect.mapError((e) => new SnapshotInvalid({ path, message: e.message })),
    )
    return makeSnapshot(revisions)
  })
