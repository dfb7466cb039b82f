/**
 * Offset resolution.
 *
 * Turns the partial position hints of every field into an absolute range.
 * Each variant runs its own cursor from 0; a field without a start inherits
 * the cursor, and `EndsAt`/`Length` move it past the field.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import {
  FieldRangeOverflowError,
  InvertedFieldRangeError,
  ZeroLengthFieldError,
  type ResolutionError,
} from "./Errors.js"
import { ResolvedField, ResolvedLayout, ResolvedVariant } from "./Layout.js"
import { errorNameFor } from "./RecordErrors.js"
import type { ValidatedFormat, ValidatedVariant } from "./Validator.js"
import { foldPositionHints } from "./internal/cursor.js"

/**
 * Resolves the fields of one variant in declaration order. Every call starts
 * its cursor at 0, so each tag of a multi-tag variant is laid out on its own.
 *
 * @category Resolution
 * @since 0.1.0
 */
export const resolveVariant = (variant: ValidatedVariant): Effect.Effect<ResolvedVariant, ResolutionError> =>
  Effect.gen(function* () {
    let cursor = 0
    const fields: Array<ResolvedField> = []

    for (const field of variant.fields) {
      const step = foldPositionHints(cursor, field.attributes)
      if (!Number.isSafeInteger(step.to)) {
        return yield* new FieldRangeOverflowError({ variant: variant.name, field: field.name, from: step.from })
      }
      if (step.to === step.from) {
        return yield* new ZeroLengthFieldError({ variant: variant.name, field: field.name })
      }
      if (step.to < step.from) {
        return yield* new InvertedFieldRangeError({
          variant: variant.name,
          field: field.name,
          from: step.from,
          to: step.to,
        })
      }
      cursor = step.cursor
      fields.push(new ResolvedField({ name: field.name, from: step.from, to: step.to, recordType: variant.tag }))
    }

    yield* Effect.logDebug(`Resolved ${variant.tag} (${variant.name}) into ${fields.length} fields`)
    return new ResolvedVariant({ name: variant.name, tag: variant.tag, fields })
  })

/**
 * Resolves every variant of a validated format.
 *
 * @category Resolution
 * @since 0.1.0
 */
export const resolveLayout = (format: ValidatedFormat): Effect.Effect<ResolvedLayout, ResolutionError> =>
  Effect.map(
    Effect.forEach(format.variants, resolveVariant),
    (variants) =>
      new ResolvedLayout({
        format: format.name,
        errorName: errorNameFor(format.name),
        tagLength: format.tagLength,
        variants,
      }),
  )
