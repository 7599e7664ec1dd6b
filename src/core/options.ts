import type { DecodeOptions } from './types'

export type ResolvedDecodeOptions = Required<DecodeOptions>

export const LOG_PREFIX = '[scene3mf]'

export const DEFAULT_DECODE_OPTIONS: ResolvedDecodeOptions = {
  resolveForwardReferences: true,
  rootName: '3MF',
  debug: false,
  logger: console,
}

export function resolveDecodeOptions(overrides?: DecodeOptions): ResolvedDecodeOptions {
  return { ...DEFAULT_DECODE_OPTIONS, ...overrides }
}
