import { Array as A, HashMap, Match, Order, pipe } from 'effect'
import pc from 'picocolors'
import type { DestinationEffect } from '../feedback/destination-effect.js'
import type { ActionResult } from '../feedback/result.js'
import type { RefDiff } from '../refs/entities.js'
import { symbols } from './symbols.js'

const byName = <A>(map: HashMap.HashMap<string, A>): Array<readonly [string, A]> =>
  A.sort(
    Array.from(map),
    Order.mapInput(Order.string, ([name]: readonly [string, A]) => name),
  )

export const formatRefDiff = (diff: RefDiff): ReadonlyArray<string> => [
  ...byName(diff.deleted).map(([name, ref]) => `  ${symbols.deleted}  ${name} ${pc.dim(ref.revision)}`),
  ...byName(diff.inserted).map(([name, ref]) => `  ${symbols.inserted}  ${name} ${pc.dim(ref.revision)}`),
  ...byName(diff.updated).map(([name, update]) => `  ${symbols.updated}  ${name} ${pc.dim(update.description)}`),
]

export const formatDiffSummary = (diff: RefDiff): string => {
  if (diff.isEmpty) return pc.dim('no reference changes')
  return pipe(
    [
      HashMap.size(diff.deleted) > 0 ? pc.red(`${HashMap.size(diff.deleted)} deleted`) : '',
      HashMap.size(diff.inserted) > 0 ? pc.green(`${HashMap.size(diff.inserted)} inserted`) : '',
      HashMap.size(diff.updated) > 0 ? pc.yellow(`${HashMap.size(diff.updated)} updated`) : '',
    ],
    A.filter((s) => s.length > 0),
    A.join(', '),
  )
}

export const formatResult = (action: string, result: ActionResult): string =>
  Match.value(result).pipe(
    Match.tag('Success', () => `  ${symbols.pass} ${action}`),
    Match.tag('NoOp', (r) => `  ${symbols.info} ${action} ${pc.dim(r.message === undefined ? '(noop)' : `(noop: ${r.message})`)}`),
    Match.tag('Error', (r) => `  ${symbols.fail} ${action} ${pc.red(r.message)}`),
    Match.exhaustive,
  )

export const formatEffect = (effect: DestinationEffect): string => {
  const origins = effect.originRefs.map((o) => o.ref).join(', ')
  const target = effect.destinationRef.url ?? `${effect.destinationRef.type} ${effect.destinationRef.id}`
  const head = `  ${symbols.effect}  ${effect.summary} ${symbols.arrow} ${pc.dim(target)}`
  const lines = [origins.length > 0 ? `${head} ${pc.dim(`[${origins}]`)}` : head]
  for (const error of effect.errors) {
    lines.push(`      ${symbols.fail} ${error}`)
  }
  return lines.join('\n')
}

export const formatDuration = (ms: number): string => ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`

/** Readable text for whatever an action body failed with. */
export const formatCause = (cause: unknown): string => {
  if (cause instanceof Error) return cause.message
  if (typeof cause === 'string') return cause
  try {
    return JSON.stringify(cause) ?? String(cause)
  } catch {
    return String(cause)
  }
}
