/**
 * Schema defect hierarchy.
 *
 * Every way a format declaration can be rejected at compile time. Each defect
 * names the declaration it was found in so callers can pattern match with
 * `Effect.catchTag` or report the message as is. No parser is produced once a
 * defect is raised.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * The declaration failed its structural schema (negative hint, missing codec,
 * non-integer discriminant, ...).
 *
 * @category Errors
 * @since 0.1.0
 */
export class MalformedDeclarationError extends Data.TaggedError("MalformedDeclarationError")<{
  readonly issue: string
}> {
  override get message(): string {
    return `Malformed format declaration: ${this.issue}`
  }
}

/**
 * The declaration describes a single record shape instead of tagged variants.
 *
 * @category Errors
 * @since 0.1.0
 */
export class NotAVariantFormatError extends Data.TaggedError("NotAVariantFormatError")<{
  readonly format: string
}> {
  override get message(): string {
    return `Format ${this.format} must be declared as tagged variants, not as a single record shape`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new DiscriminantNotAllowedError({ variant: "Header", discriminant: 1 })
 * yield* Effect.fail(error)
 * ```
 */
export class DiscriminantNotAllowedError extends Data.TaggedError("DiscriminantNotAllowedError")<{
  readonly variant: string
  readonly discriminant: number
}> {
  override get message(): string {
    return `Variant ${this.variant} must not set a discriminant (found ${this.discriminant})`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export class UnexpectedVariantAttributeError extends Data.TaggedError("UnexpectedVariantAttributeError")<{
  readonly variant: string
  readonly attribute: string
}> {
  override get message(): string {
    return `Only the tag declaration is expected on a variant, but ${this.variant} declares \`${this.attribute}\``
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export class NonLiteralTagError extends Data.TaggedError("NonLiteralTagError")<{
  readonly variant: string
}> {
  override get message(): string {
    return `The tag of ${this.variant} must be a string literal, e.g. tag("HD")`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export class EmptyTagError extends Data.TaggedError("EmptyTagError")<{
  readonly variant: string
}> {
  override get message(): string {
    return `The tag of ${this.variant} must not be empty`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export class TagLengthMismatchError extends Data.TaggedError("TagLengthMismatchError")<{
  readonly variant: string
  readonly tag: string
  readonly expected: number
}> {
  override get message(): string {
    return `All tags must be the same length: ${this.variant} declares "${this.tag}" (${this.tag.length}) but the format uses ${this.expected}`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export class FieldNameConflictError extends Data.TaggedError("FieldNameConflictError")<{
  readonly variant: string
  readonly field: string
  readonly reason: "duplicate" | "reserved"
}> {
  override get message(): string {
    return this.reason === "duplicate"
      ? `Field \`${this.field}\` is declared more than once in ${this.variant}`
      : `Field name \`${this.field}\` in ${this.variant} is reserved`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export class NoRecordTypesError extends Data.TaggedError("NoRecordTypesError")<{
  readonly format: string
}> {
  override get message(): string {
    return `No record types have been specified for ${this.format}, so the parser cannot be built`
  }
}

/**
 * A field's hints resolve to an empty range.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ZeroLengthFieldError extends Data.TaggedError("ZeroLengthFieldError")<{
  readonly variant: string
  readonly field: string
}> {
  override get message(): string {
    return `\`${this.field}\` field length is zero in ${this.variant}`
  }
}

/**
 * A field's hints place its end before its start.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvertedFieldRangeError extends Data.TaggedError("InvertedFieldRangeError")<{
  readonly variant: string
  readonly field: string
  readonly from: number
  readonly to: number
}> {
  override get message(): string {
    return `\`${this.field}\` in ${this.variant} ends at ${this.to} before it starts at ${this.from}`
  }
}

/**
 * A field's hints place its end beyond the largest safe integer offset.
 *
 * @category Errors
 * @since 0.1.0
 */
export class FieldRangeOverflowError extends Data.TaggedError("FieldRangeOverflowError")<{
  readonly variant: string
  readonly field: string
  readonly from: number
}> {
  override get message(): string {
    return `\`${this.field}\` in ${this.variant} starts at ${this.from} and ends past the largest supported offset`
  }
}

/**
 * Thrown by `makeDispatcher` when an arm does not carry one codec per field.
 *
 * @category Errors
 * @since 0.1.0
 */
export class CodecCountMismatchError extends Data.TaggedError("CodecCountMismatchError")<{
  readonly variant: string
  readonly expected: number
  readonly received: number
}> {
  override get message(): string {
    return `${this.variant} declares ${this.expected} fields but ${this.received} codecs were given`
  }
}

/**
 * Thrown by `impliedDecimal` for a scale that is not a non-negative integer.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidScaleError extends Data.TaggedError("InvalidScaleError")<{
  readonly scale: number
}> {
  override get message(): string {
    return `Implied decimal scale must be a non-negative integer, got ${this.scale}`
  }
}

/**
 * Defects raised while validating a declaration.
 *
 * @category Errors
 * @since 0.1.0
 */
export type ValidationError =
  | NotAVariantFormatError
  | DiscriminantNotAllowedError
  | UnexpectedVariantAttributeError
  | NonLiteralTagError
  | EmptyTagError
  | TagLengthMismatchError
  | FieldNameConflictError
  | NoRecordTypesError

/**
 * Defects raised while resolving field offsets.
 *
 * @category Errors
 * @since 0.1.0
 */
export type ResolutionError = ZeroLengthFieldError | InvertedFieldRangeError | FieldRangeOverflowError

/**
 * Union of every compile-time defect.
 *
 * @category Errors
 * @since 0.1.0
 */
export type SchemaDefectError = MalformedDeclarationError | ValidationError | ResolutionError
