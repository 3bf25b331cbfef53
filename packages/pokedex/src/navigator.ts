export const MIN_ID = 1
export const MAX_ID = 151

const clamp = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max)

/** The id after `current`, wrapping from `max` back to `min`. */
export function nextId(current: number, min = MIN_ID, max = MAX_ID): number {
  const base = clamp(current, min, max)
  return base + 1 > max ? min : base + 1
}

/** The id before `current`, wrapping from `min` back to `max`. */
export function prevId(current: number, min = MIN_ID, max = MAX_ID): number {
  const base = clamp(current, min, max)
  return base - 1 < min ? max : base - 1
}

export type JumpError =
  | { kind: 'not-a-number' }
  | { kind: 'out-of-range'; max: number }

export type JumpResult = { ok: true; id: number } | { ok: false; error: JumpError }

const INTEGER = /^[+-]?\d+$/

/**
 * validateJumpTarget(raw, max?)
 *
 * Parses user input for "jump to id". Only an upper bound applies: zero and
 * negative ids are returned as-is and left for the API to reject.
 */
export function validateJumpTarget(raw: string, max = MAX_ID): JumpResult {
  const text = raw.trim()
  if (!INTEGER.test(text)) return { ok: false, error: { kind: 'not-a-number' } }

  const id = Number(text)
  if (id > max) return { ok: false, error: { kind: 'out-of-range', max } }
  if (!Number.isSafeInteger(id)) return { ok: false, error: { kind: 'not-a-number' } }

  // "-0" parses to -0
  return { ok: true, id: id === 0 ? 0 : id }
}
