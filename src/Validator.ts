/**
 * Declaration validation.
 *
 * Checks a declaration for format-wide consistency before any offset is
 * resolved: the declaration must describe tagged variants, every tag must be a
 * non-empty string literal, and all tags must share one length. Validation
 * stops at the first defect.
 *
 * @since 0.1.0
 */

import { Effect, ParseResult, Schema } from "effect"
import type { FieldDeclaration, FormatDeclaration, VariantAttribute, VariantDeclaration } from "./Declaration.js"
import { FormatDeclarationSchema } from "./Declaration.js"
import {
  DiscriminantNotAllowedError,
  EmptyTagError,
  FieldNameConflictError,
  MalformedDeclarationError,
  NoRecordTypesError,
  NonLiteralTagError,
  NotAVariantFormatError,
  TagLengthMismatchError,
  UnexpectedVariantAttributeError,
  type ValidationError,
} from "./Errors.js"

/**
 * A variant bound to exactly one tag. A variant declaring several tags yields
 * one of these per tag.
 *
 * @category Models
 * @since 0.1.0
 */
export interface ValidatedVariant {
  readonly name: string
  readonly tag: string
  readonly fields: ReadonlyArray<FieldDeclaration>
}

/**
 * @category Models
 * @since 0.1.0
 */
export interface ValidatedFormat {
  readonly name: string
  readonly tagLength: number
  readonly variants: ReadonlyArray<ValidatedVariant>
}

/**
 * Controls how tags declared by more than one variant are reported. The first
 * declaration always wins dispatch.
 *
 * @category Models
 * @since 0.1.0
 */
export type DuplicateTagPolicy = "allow" | "warn"

const RESERVED_FIELD_NAMES: ReadonlySet<string> = new Set(["_tag", "__proto__"])

const decodeFormatDeclaration = Schema.decodeUnknown(FormatDeclarationSchema)

/**
 * Checks the declaration against its structural schema.
 *
 * @category Validation
 * @since 0.1.0
 */
export const checkStructure = (declaration: unknown): Effect.Effect<void, MalformedDeclarationError> =>
  decodeFormatDeclaration(declaration).pipe(
    Effect.asVoid,
    Effect.mapError((error) => new MalformedDeclarationError({ issue: ParseResult.TreeFormatter.formatErrorSync(error) })),
  )

const attributeName = (attribute: VariantAttribute): string => {
  switch (attribute._tag) {
    case "Tag":
      return "tag"
    case "StartsAt":
      return "starts-at"
    case "EndsAt":
      return "ends-at"
    case "Length":
      return "length"
    case "Unrecognized":
      return attribute.name
  }
}

const readTag = (
  variant: VariantDeclaration,
  attribute: VariantAttribute,
): Effect.Effect<string, UnexpectedVariantAttributeError | NonLiteralTagError | EmptyTagError> => {
  if (attribute._tag !== "Tag") {
    return Effect.fail(
      new UnexpectedVariantAttributeError({ variant: variant.name, attribute: attributeName(attribute) }),
    )
  }
  if (attribute.value._tag !== "StringLiteral") {
    return Effect.fail(new NonLiteralTagError({ variant: variant.name }))
  }
  return attribute.value.value.length === 0
    ? Effect.fail(new EmptyTagError({ variant: variant.name }))
    : Effect.succeed(attribute.value.value)
}

const checkFieldNames = (variant: VariantDeclaration): Effect.Effect<void, FieldNameConflictError> => {
  const seen = new Set<string>()
  for (const field of variant.fields) {
    if (RESERVED_FIELD_NAMES.has(field.name)) {
      return Effect.fail(new FieldNameConflictError({ variant: variant.name, field: field.name, reason: "reserved" }))
    }
    if (seen.has(field.name)) {
      return Effect.fail(new FieldNameConflictError({ variant: variant.name, field: field.name, reason: "duplicate" }))
    }
    seen.add(field.name)
  }
  return Effect.void
}

/**
 * Validates a declaration and binds every variant to its tags.
 *
 * @category Validation
 * @since 0.1.0
 */
export const validateFormat = (declaration: FormatDeclaration): Effect.Effect<ValidatedFormat, ValidationError> =>
  Effect.gen(function* () {
    if (declaration.shape !== "variants") {
      return yield* new NotAVariantFormatError({ format: declaration.name })
    }

    let tagLength = 0
    const variants: Array<ValidatedVariant> = []

    for (const variant of declaration.variants) {
      if (variant.discriminant !== undefined) {
        return yield* new DiscriminantNotAllowedError({ variant: variant.name, discriminant: variant.discriminant })
      }
      yield* checkFieldNames(variant)

      const tags = yield* Effect.forEach(variant.attributes, (attribute) => readTag(variant, attribute))
      if (tags.length === 0) {
        yield* Effect.logWarning(`Variant ${variant.name} declares no tag and can never be parsed`)
        continue
      }

      for (const tag of tags) {
        if (tagLength === 0) {
          tagLength = tag.length
        } else if (tag.length !== tagLength) {
          return yield* new TagLengthMismatchError({ variant: variant.name, tag, expected: tagLength })
        }
        variants.push({ name: variant.name, tag, fields: variant.fields })
      }
    }

    if (tagLength === 0) {
      return yield* new NoRecordTypesError({ format: declaration.name })
    }

    return { name: declaration.name, tagLength, variants }
  })

/**
 * Tags claimed by more than one validated variant, each with the variants in
 * dispatch order.
 *
 * @category Validation
 * @since 0.1.0
 */
export const findDuplicateTags = (format: ValidatedFormat): ReadonlyMap<string, ReadonlyArray<string>> => {
  const owners = new Map<string, Array<string>>()
  for (const variant of format.variants) {
    const names = owners.get(variant.tag)
    if (names) {
      names.push(variant.name)
    } else {
      owners.set(variant.tag, [variant.name])
    }
  }
  return new Map([...owners].filter(([, names]) => names.length > 1))
}

/**
 * Logs a warning per duplicated tag unless the policy allows them silently.
 *
 * @category Validation
 * @since 0.1.0
 */
export const reportDuplicateTags = (format: ValidatedFormat, policy: DuplicateTagPolicy): Effect.Effect<void> =>
  policy === "allow"
    ? Effect.void
    : Effect.forEach(
        findDuplicateTags(format),
        ([tag, names]) =>
          Effect.logWarning(`Tag "${tag}" is declared by ${names.join(", ")}; ${names[0] ?? ""} takes precedence`),
        { discard: true },
      )
