// Programmatic API
export { CONFIG_NAMES, loadConfig } from '../lib/config/loader.js'
export { defineConfig, resolveDefaults } from '../lib/config/schema.js'
export * from '../lib/errors.js'
export { logConsole, makeMemoryConsole, terminalConsole } from '../lib/feedback/console.js'
export { DestinationEffect, DestinationRef, EffectType, OriginRef } from '../lib/feedback/destination-effect.js'
export { runFeedback } from '../lib/feedback/migration.js'
export { ActionError, ActionNoOp, ActionResult, ActionSuccess, error, isActionResult, noop, success } from '../lib/feedback/result.js'
export { ActionRunner } from '../lib/feedback/runner.js'
export { diffRefs } from '../lib/refs/diff.js'
export { makeSnapshot, NamedReference, RefDiff, RefUpdate } from '../lib/refs/entities.js'
export { loadSnapshot } from '../lib/refs/snapshot.js'

// Types
export type { Config, ConsoleKind, Feedback, FeedbackAction, ResolvedConfig } from '../lib/config/schema.js'
export type { ConsoleLine, FeedbackConsole, Severity } from '../lib/feedback/console.js'
export type { Endpoint } from '../lib/feedback/endpoint.js'
export type { ActionDefinition, FeedbackDefinition, FeedbackError, FeedbackOutcome } from '../lib/feedback/migration.js'
export type { ActionBody, ActionInvocation, ActionParams, EffectInput } from '../lib/feedback/runner.js'
export type { RefSnapshot } from '../lib/refs/entities.js'
