import chalk, { type ChalkInstance } from 'chalk'
import type { ErrorFault } from '@capstack/core'

export const t = {
  blue:   chalk.hex('#4FC3F7'),
  text:   chalk.hex('#C8C8C0'),
  white:  chalk.hex('#F2F2EC'),
  dim:    chalk.hex('#444444'),
  muted:  chalk.hex('#666666'),
  amber:  chalk.hex('#D4880A'),
  green:  chalk.hex('#81C784'),
  red:    chalk.hex('#CF6679'),
} as const

const _faultColors: Record<ErrorFault, ChalkInstance> = {
  caller:  t.amber,
  backend: t.red,
}

export const faultColor = (fault: ErrorFault): ChalkInstance => _faultColors[fault]

export const activeMark = (active: boolean): string => (active ? t.green('●') : t.dim('○'))
