/**
 * Position-hint folding (pure)
 *
 * @since 0.1.0
 * @internal
 */

import type { FieldAttribute } from "../Declaration.js"

/**
 * Outcome of folding one field's hints: its range, its width, and where the
 * variant's cursor stands for the next field.
 *
 * @since 0.1.0
 * @internal
 */
export interface CursorStep {
  readonly from: number
  readonly to: number
  readonly length: number
  readonly cursor: number
}

/**
 * Folds a field's attributes in declaration order, starting at `cursor`.
 *
 * `StartsAt` moves the start and keeps the known length; `EndsAt` and `Length`
 * fix the end and advance the cursor to it. Unrecognized attributes are
 * skipped. `to - from === length` holds after every step.
 *
 * @example
 * ```typescript
 * foldPositionHints(10, [{ _tag: "Length", value: 4 }])
 * // { from: 10, to: 14, length: 4, cursor: 14 }
 *
 * foldPositionHints(10, [{ _tag: "Length", value: 4 }, { _tag: "StartsAt", value: 2 }])
 * // { from: 2, to: 6, length: 4, cursor: 14 }
 * ```
 *
 * @since 0.1.0
 * @internal
 */
export function foldPositionHints(cursor: number, attributes: ReadonlyArray<FieldAttribute>): CursorStep {
  let from = cursor
  let length = 0
  let to = cursor
  let next = cursor

  for (const attribute of attributes) {
    switch (attribute._tag) {
      case "StartsAt":
        from = attribute.value
        to = from + length
        break
      case "EndsAt":
        to = attribute.value
        length = to - from
        next = to
        break
      case "Length":
        length = attribute.value
        to = from + length
        next = to
        break
      case "Unrecognized":
        break
    }
  }

  return { from, to, length, cursor: next }
}
