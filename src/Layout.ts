/**
 * Resolved Layouts
 *
 * The compiler's output model: every variant with its tag and every field with
 * an absolute half-open range `[from, to)` into the line. This is the table the
 * dispatcher interprets, and it encodes to plain JSON.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"

/**
 * One field with its resolved range.
 *
 * @category Models
 * @since 0.1.0
 */
export class ResolvedField extends Schema.Class<ResolvedField>("ResolvedField")({
  name: Schema.NonEmptyString,
  from: Schema.NonNegativeInt,
  to: Schema.NonNegativeInt,
  recordType: Schema.String,
}) {
  get width(): number {
    return this.to - this.from
  }
}

/**
 * One dispatch arm: a tag and the fields read when it matches.
 *
 * @category Models
 * @since 0.1.0
 */
export class ResolvedVariant extends Schema.Class<ResolvedVariant>("ResolvedVariant")({
  name: Schema.NonEmptyString,
  tag: Schema.NonEmptyString,
  fields: Schema.Array(ResolvedField),
}) {}

/**
 * Complete layout of a format. Variants keep declaration order, which is also
 * dispatch precedence.
 *
 * @category Models
 * @since 0.1.0
 */
export class ResolvedLayout extends Schema.Class<ResolvedLayout>("ResolvedLayout")({
  format: Schema.NonEmptyString,
  errorName: Schema.NonEmptyString,
  tagLength: Schema.Int.pipe(Schema.positive()),
  variants: Schema.Array(ResolvedVariant),
}) {}

const printField = (field: ResolvedField): string =>
  `  ${field.name} [${field.from}, ${field.to}) width ${field.width}`

const printVariant = (variant: ResolvedVariant): string =>
  [`record ${variant.tag} ${variant.name}`, ...variant.fields.map(printField)].join("\n")

/**
 * Stable text listing of a layout, one line per record and field.
 *
 * @category Rendering
 * @since 0.1.0
 * @example
 * ```ts
 * printLayout(parser.layout)
 * // format Person (tag width 2, errors PersonParseError)
 * // record HD Header
 * //   name [2, 12) width 10
 * ```
 */
export const printLayout = (layout: ResolvedLayout): string =>
  [
    `format ${layout.format} (tag width ${layout.tagLength}, errors ${layout.errorName})`,
    ...layout.variants.map(printVariant),
  ].join("\n")
