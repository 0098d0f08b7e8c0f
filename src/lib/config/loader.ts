import { Effect, Schema } from 'effect'
import { createJiti } from 'jiti'
import { existsSync } from 'node:fs'
import { resolve } from 'node:path'
import { ConfigInvalid, ConfigNotFound } from '../errors.js'
import { Config } from './schema.js'

export const CONFIG_NAMES = ['feedsync.config.ts', 'feedsync.config.js', 'feedsync.config.mjs']

export const loadConfig = (
  cwd: string,
  configPath?: string,
): Effect.Effect<Config, ConfigNotFound | ConfigInvalid> =>
  Effect.gen(function*() {
    const abs = configPath
      ? resolve(cwd, configPath)
      : CONFIG_NAMES.map((name) => resolve(cwd, name)).find((candidate) => existsSync(candidate))

    if (abs === undefined) {
      return yield* new ConfigNotFound({ cwd, searched: CONFIG_NAMES })
    }

    const jiti = createJiti(import.meta.url)
    const raw = yield* Effect.tryPromise({
      try: () => jiti.import(abs, { default: true }),
      catch: (e) => new ConfigInvalid({ path: abs, message: String(e) }),
    })

    return yield* Schema.decodeUnknown(Config)(raw).pipe(
      Effect.mapError((e) => new ConfigInvalid({ path: abs, message: e.message })),
    )
  })
