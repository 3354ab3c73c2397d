import chalk, { type ChalkInstance } from 'chalk'

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

const _kindColors: Record<string, ChalkInstance> = {
  code:  t.blue,
  other: t.muted,
}

export const kindColor = (kind: string): ChalkInstance =>
  _kindColors[kind] ?? t.muted
