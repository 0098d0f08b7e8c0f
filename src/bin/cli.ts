#!/usr/bin/env node

import { Args, Command, Options } from '@effect/cli'
import { FileSystem } from '@effect/platform'
import { NodeContext, NodeRuntime } from '@effect/platform-node'
import { Console, Effect, Match, Option, Schema } from 'effect'
import { readFileSync } from 'node:fs'
import pc from 'picocolors'
import { loadConfig } from '../lib/config/loader.js'
import { resolveDefaults } from '../lib/config/schema.js'
import type {
  ActionBodyFailed,
  ConfigInvalid,
  ConfigNotFound,
  FeedbackAborted,
  FeedbackActionInvalid,
  FeedbackNoop,
  SnapshotInvalid,
} from '../lib/errors.js'
import { FeedbackNotFound } from '../lib/errors.js'
import { logConsole, terminalConsole } from '../lib/feedback/console.js'
import type { DestinationEffect } from '../lib/feedback/destination-effect.js'
import { runFeedback } from '../lib/feedback/migration.js'
import { diffRefs } from '../lib/refs/diff.js'
import { loadSnapshot } from '../lib/refs/snapshot.js'
import { formatCause, formatDiffSummary, formatDuration, formatEffect, formatRefDiff, formatResult } from '../lib/ui/format.js'
import { symbols } from '../lib/ui/symbols.js'

const pkg = Schema.decodeUnknownSync(Schema.parseJson(Schema.Struct({ version: Schema.String })))(
  readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'),
)

// ---------------------------------------------------------------------------
// Shared options
// ---------------------------------------------------------------------------

const configOption = Options.file('config').pipe(
  Options.withAlias('c'),
  Options.withDescription('Path to config file'),
  Options.optional,
)

// ---------------------------------------------------------------------------
// Error formatting
// ---------------------------------------------------------------------------

type CliError =
  | ConfigNotFound
  | ConfigInvalid
  | FeedbackNotFound
  | SnapshotInvalid
  | FeedbackActionInvalid
  | ActionBodyFailed
  | FeedbackAborted
  | FeedbackNoop

const formatError = Match.type<CliError>().pipe(
  Match.tag(
    'ConfigNotFound',
    (e) =>
      `${symbols.fail} No config found in ${e.cwd}\n  Searched: ${e.searched.join(', ')}\n  Run ${
        pc.bold('feedsync init')
      } to create one`,
  ),
  Match.tag('ConfigInvalid', (e) => `${symbols.fail} Invalid config at ${e.path}\n  ${e.message}`),
  Match.tag(
    'FeedbackNotFound',
    (e) => `${symbols.fail} No feedback migration named '${e.name}'\n  Available: ${e.available.join(', ') || '(none)'}`,
  ),
  Match.tag('SnapshotInvalid', (e) => `${symbols.fail} Invalid snapshot at ${e.path}\n  ${e.message}`),
  Match.tag('FeedbackActionInvalid', (e) => `${symbols.fail} ${e.message}`),
  Match.tag('ActionBodyFailed', (e) => `${symbols.fail} Action '${e.actionName}' failed: ${formatCause(e.cause)}`),
  Match.tag('FeedbackAborted', (e) => `${symbols.fail} ${e.message}`),
  Match.tag('FeedbackNoop', (e) => `${symbols.info} ${e.message}`),
  Match.exhaustive,
)

const printEffects = (effects: ReadonlyArray<DestinationEffect>) =>
  Effect.forEach(effects, (effect) => Console.log(formatEffect(effect)), { discard: true })

const fail = (e: CliError) =>
  Console.error(`\n  ${formatError(e)}\n`).pipe(
    Effect.zipRight(Effect.sync(() => {
      process.exitCode = 1
    })),
  )

// ---------------------------------------------------------------------------
// diff
// ---------------------------------------------------------------------------

const diff = Command.make(
  'diff',
  {
    before: Args.file({ name: 'before', exists: 'yes' }),
    after: Args.file({ name: 'after', exists: 'yes' }),
  },
  (args) =>
    Effect.gen(function*() {
      const before = yield* loadSnapshot(args.before)
      const after = yield* loadSnapshot(args.after)
      const result = diffRefs(before, after)

      yield* Console.log('')
      for (const line of formatRefDiff(result)) {
        yield* Console.log(line)
      }
      yield* Console.log(`\n  ${formatDiffSummary(result)}\n`)
    }).pipe(Effect.catchTag('SnapshotInvalid', fail)),
).pipe(Command.withDescription('Show references deleted, inserted or updated between two snapshots'))

// ---------------------------------------------------------------------------
// feedback
// ---------------------------------------------------------------------------

const feedback = Command.make(
  'feedback',
  {
    config: configOption,
    name: Args.text({ name: 'name' }).pipe(Args.withDescription('Feedback migration to run')),
    ref: Options.text('ref').pipe(
      Options.withDescription('Reference that triggered the event'),
      Options.optional,
    ),
  },
  (opts) =>
    Effect.gen(function*() {
      const cwd = process.cwd()
      const config = resolveDefaults(yield* loadConfig(cwd, Option.getOrUndefined(opts.config)))

      const definition = config.feedbacks.find((f) => f.name === opts.name)
      if (definition === undefined) {
        return yield* new FeedbackNotFound({ name: opts.name, available: config.feedbacks.map((f) => f.name) })
      }

      const start = Date.now()
      const outcome = yield* runFeedback(definition, {
        ref: Option.getOrUndefined(opts.ref),
        console: config.console === 'log' ? logConsole : terminalConsole,
      })

      yield* Console.log('')
      for (const { action, result } of outcome.results) {
        yield* Console.log(formatResult(action, result))
      }
      yield* printEffects(outcome.effects)
      yield* Console.log(
        `\n  ${symbols.pass} ${definition.name}: ${outcome.effects.length} effect${
          outcome.effects.length === 1 ? '' : 's'
        }  ${pc.dim('⏱')} ${formatDuration(Date.now() - start)}\n`,
      )
    }).pipe(
      Effect.catchTags({
        FeedbackNoop: (e) => printEffects(e.effects).pipe(Effect.zipRight(Console.log(`\n  ${formatError(e)}\n`))),
        FeedbackAborted: (e) => printEffects(e.effects).pipe(Effect.zipRight(fail(e))),
        ConfigNotFound: fail,
        ConfigInvalid: fail,
        FeedbackNotFound: fail,
        FeedbackActionInvalid: (e) => printEffects(e.effects).pipe(Effect.zipRight(fail(e))),
        ActionBodyFailed: (e) => printEffects(e.effects).pipe(Effect.zipRight(fail(e))),
      }),
    ),
).pipe(Command.withDescription('Run a configured feedback migration'))

// ---------------------------------------------------------------------------
// init
// ---------------------------------------------------------------------------

const starterConfig = `import { Effect } from 'effect'
import { defineConfig } from 'feedsync'
import { origin, destination } from './endpoints.js'

export default defineConfig({
  feedbacks: [
    {
      name: 'sync-back',
      origin,
      destination,
      actions: [
        {
          name: 'report',
          run: (ctx) => Effect.succeed(ctx.noop('nothing to do yet')),
        },
      ],
    },
  ],
})
`

const init = Command.make(
  'init',
  {},
  () =>
    Effect.gen(function*() {
      const cwd = process.cwd()
      const fs = yield* FileSystem.FileSystem
      const configPath = `${cwd}/feedsync.config.ts`

      const exists = yield* fs.exists(configPath)
      if (exists) {
        yield* Console.error(`\n  ${symbols.fail} feedsync.config.ts already exists\n`)
        return
      }

      yield* fs.writeFileString(configPath, starterConfig)

      yield* Console.log(`\n  ${symbols.pass} Created feedsync.config.ts`)
      yield* Console.log(`\n  Next steps:`)
      yield* Console.log(`    1. Export your origin and destination endpoints from ./endpoints.ts`)
      yield* Console.log(`    2. Replace the starter action with your own`)
      yield* Console.log(`    3. Run ${pc.bold('feedsync feedback sync-back --ref <ref>')}\n`)
    }),
).pipe(Command.withDescription('Create a starter feedsync.config.ts'))

// ---------------------------------------------------------------------------
// Root command
// ---------------------------------------------------------------------------

const feedsync = Command.make('feedsync').pipe(
  Command.withDescription('Classify reference moves and run feedback actions on migration events'),
  Command.withSubcommands([diff, feedback, init]),
)

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

const cli = Command.run(feedsync, {
  name: 'feedsync',
  version: pkg.version,
})

cli(process.argv).pipe(
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
)
