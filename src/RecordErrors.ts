/**
 * Errors returned by compiled parsers.
 *
 * A parser fails in exactly two ways: the line's tag selects no variant, or one
 * field's text does not decode with its codec. Both are values in the error
 * channel, never thrown.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * The leading tag-width slice of the line matches no variant, or the line is
 * shorter than the tag.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidTagError extends Data.TaggedError("InvalidTagError")<{
  readonly format: string
}> {
  override get message(): string {
    return "invalid record type"
  }
}

/**
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new FieldParseError({ format: "Statement", recordType: "HD", field: "age" })
 * error.message // "failed to parse field `age` in HD record."
 * ```
 */
export class FieldParseError extends Data.TaggedError("FieldParseError")<{
  readonly format: string
  readonly recordType: string
  readonly field: string
}> {
  override get message(): string {
    return `failed to parse field \`${this.field}\` in ${this.recordType} record.`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export type RecordParseError = InvalidTagError | FieldParseError

/**
 * Error constructors bound to one format.
 *
 * @category Models
 * @since 0.1.0
 */
export interface ErrorModel {
  /** `<format>ParseError` */
  readonly name: string
  readonly invalidTag: () => InvalidTagError
  readonly fieldFailure: (recordType: string, field: string) => FieldParseError
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const errorNameFor = (format: string): string => `${format}ParseError`

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeErrorModel = (format: string): ErrorModel => ({
  name: errorNameFor(format),
  invalidTag: () => new InvalidTagError({ format }),
  fieldFailure: (recordType, field) => new FieldParseError({ format, recordType, field }),
})
