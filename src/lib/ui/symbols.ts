import pc from 'picocolors'

export const symbols = {
  pass: pc.green('✓'),
  fail: pc.red('✗'),
  warn: pc.yellow('⚠'),
  info: pc.blue('ℹ'),
  arrow: pc.dim('→'),
  deleted: pc.red('DELETE'),
  inserted: pc.green('INSERT'),
  updated: pc.yellow('UPDATE'),
  effect: pc.cyan('EFFECT'),
} as const
