/**
 * Format Declarations
 *
 * The structured model a front-end hands to the compiler: a named format, its
 * record variants in declaration order, and for every variant the fields with
 * their position hints. Surface syntax never reaches the compiler; the helpers
 * at the bottom of this module build the model directly.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"

/**
 * Literal value attached to an attribute.
 *
 * @category Attributes
 * @since 0.1.0
 */
export const StringLiteral = Schema.TaggedStruct("StringLiteral", { value: Schema.String })
export type StringLiteral = typeof StringLiteral.Type

/**
 * @category Attributes
 * @since 0.1.0
 */
export const IntegerLiteral = Schema.TaggedStruct("IntegerLiteral", { value: Schema.Int })
export type IntegerLiteral = typeof IntegerLiteral.Type

/**
 * Any attribute value that is not a literal, kept as source text for
 * diagnostics.
 *
 * @category Attributes
 * @since 0.1.0
 */
export const Expression = Schema.TaggedStruct("Expression", { source: Schema.String })
export type Expression = typeof Expression.Type

/**
 * @category Attributes
 * @since 0.1.0
 */
export const AttributeValue = Schema.Union(StringLiteral, IntegerLiteral, Expression)
export type AttributeValue = typeof AttributeValue.Type

/**
 * Tag declaration of a variant.
 *
 * @category Attributes
 * @since 0.1.0
 */
export const Tag = Schema.TaggedStruct("Tag", { value: AttributeValue })
export type Tag = typeof Tag.Type

/**
 * Pins the first character of a field. Does not move the variant's cursor.
 *
 * @category Position Hints
 * @since 0.1.0
 */
export const StartsAt = Schema.TaggedStruct("StartsAt", { value: Schema.NonNegativeInt })
export type StartsAt = typeof StartsAt.Type

/**
 * Exclusive end of a field. Moves the variant's cursor to the end.
 *
 * @category Position Hints
 * @since 0.1.0
 */
export const EndsAt = Schema.TaggedStruct("EndsAt", { value: Schema.NonNegativeInt })
export type EndsAt = typeof EndsAt.Type

/**
 * Width of a field. Moves the variant's cursor to the end.
 *
 * @category Position Hints
 * @since 0.1.0
 */
export const Length = Schema.TaggedStruct("Length", { value: Schema.NonNegativeInt })
export type Length = typeof Length.Type

/**
 * @category Position Hints
 * @since 0.1.0
 */
export const PositionHint = Schema.Union(StartsAt, EndsAt, Length)
export type PositionHint = typeof PositionHint.Type

/**
 * Attribute the compiler does not know. Ignored on fields, rejected on
 * variants.
 *
 * @category Attributes
 * @since 0.1.0
 */
export const Unrecognized = Schema.TaggedStruct("Unrecognized", {
  name: Schema.String,
  value: AttributeValue,
})
export type Unrecognized = typeof Unrecognized.Type

/**
 * @category Attributes
 * @since 0.1.0
 */
export const FieldAttribute = Schema.Union(StartsAt, EndsAt, Length, Unrecognized)
export type FieldAttribute = typeof FieldAttribute.Type

/**
 * @category Attributes
 * @since 0.1.0
 */
export const VariantAttribute = Schema.Union(Tag, StartsAt, EndsAt, Length, Unrecognized)
export type VariantAttribute = typeof VariantAttribute.Type

/**
 * Converts the text of one field into its value. Any `Schema` whose encoded
 * side is a string works, e.g. `Schema.NumberFromString` or the codecs in
 * `Codecs`.
 *
 * @category Declarations
 * @since 0.1.0
 */
export type FieldCodec = Schema.Schema.AnyNoContext & { readonly Encoded: string }

const FieldCodecSchema = Schema.declare(
  (input: unknown): input is FieldCodec => Schema.isSchema(input),
  { identifier: "FieldCodec" },
)

/**
 * @category Declarations
 * @since 0.1.0
 */
export interface FieldDeclaration<
  Name extends string = string,
  Codec extends FieldCodec = FieldCodec,
> {
  readonly name: Name
  readonly codec: Codec
  readonly attributes: ReadonlyArray<FieldAttribute>
}

/**
 * @category Declarations
 * @since 0.1.0
 */
export interface VariantDeclaration<
  Name extends string = string,
  Fields extends ReadonlyArray<FieldDeclaration> = ReadonlyArray<FieldDeclaration>,
> {
  readonly name: Name
  readonly discriminant?: number | undefined
  readonly attributes: ReadonlyArray<VariantAttribute>
  readonly fields: Fields
}

/**
 * `"variants"` describes mutually exclusive record shapes selected by tag;
 * `"struct"` is a single fixed shape, which cannot be compiled.
 *
 * @category Declarations
 * @since 0.1.0
 */
export type FormatShape = "variants" | "struct"

/**
 * @category Declarations
 * @since 0.1.0
 */
export interface FormatDeclaration<
  Variants extends ReadonlyArray<VariantDeclaration> = ReadonlyArray<VariantDeclaration>,
> {
  readonly name: string
  readonly shape: FormatShape
  readonly variants: Variants
}

/**
 * Structural schema of a declaration, checked before validation.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const FieldDeclarationSchema = Schema.Struct({
  name: Schema.NonEmptyString,
  codec: FieldCodecSchema,
  attributes: Schema.Array(FieldAttribute),
})

/**
 * @category Schemas
 * @since 0.1.0
 */
export const VariantDeclarationSchema = Schema.Struct({
  name: Schema.NonEmptyString,
  discriminant: Schema.optional(Schema.Int),
  attributes: Schema.Array(VariantAttribute),
  fields: Schema.Array(FieldDeclarationSchema),
})

/**
 * @category Schemas
 * @since 0.1.0
 */
export const FormatDeclarationSchema = Schema.Struct({
  name: Schema.NonEmptyString,
  shape: Schema.Literal("variants", "struct"),
  variants: Schema.Array(VariantDeclarationSchema),
})

type FieldsRecord<Fields extends ReadonlyArray<FieldDeclaration>> = {
  readonly [F in Fields[number] as F["name"]]: Schema.Schema.Type<F["codec"]>
}

/**
 * Value produced for one variant: its name under `_tag`, then one property per
 * field typed by the field's codec.
 *
 * @category Declarations
 * @since 0.1.0
 */
export type VariantRecord<V> = V extends VariantDeclaration<
  infer Name extends string,
  infer Fields extends ReadonlyArray<FieldDeclaration>
>
  ? { readonly _tag: Name } & FieldsRecord<Fields>
  : never

/**
 * Result type of the parser compiled from a declaration.
 *
 * @category Declarations
 * @since 0.1.0
 * @example
 * ```ts
 * const Statement = format("Statement", [
 *   variant("Header", [tag("HD")], [field("account", TrimmedText, startsAt(2), length(8))]),
 * ])
 * type Statement = RecordOf<typeof Statement>
 * // { readonly _tag: "Header"; readonly account: string }
 * ```
 */
export type RecordOf<D> = D extends FormatDeclaration<infer Variants extends ReadonlyArray<VariantDeclaration>>
  ? VariantRecord<Variants[number]>
  : never

/**
 * Declares the tag a variant is selected by.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const tag = (value: string): Tag => ({ _tag: "Tag", value: { _tag: "StringLiteral", value } })

/**
 * @category Constructors
 * @since 0.1.0
 */
export const startsAt = (value: number): StartsAt => ({ _tag: "StartsAt", value })

/**
 * @category Constructors
 * @since 0.1.0
 */
export const endsAt = (value: number): EndsAt => ({ _tag: "EndsAt", value })

/**
 * @category Constructors
 * @since 0.1.0
 */
export const length = (value: number): Length => ({ _tag: "Length", value })

/**
 * Declares a field; attributes are applied in the order given.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const field = <const Name extends string, Codec extends FieldCodec>(
  name: Name,
  codec: Codec,
  ...attributes: ReadonlyArray<FieldAttribute>
): FieldDeclaration<Name, Codec> => ({ name, codec, attributes })

/**
 * @category Constructors
 * @since 0.1.0
 */
export const variant = <const Name extends string, const Fields extends ReadonlyArray<FieldDeclaration>>(
  name: Name,
  attributes: ReadonlyArray<VariantAttribute>,
  fields: Fields,
): VariantDeclaration<Name, Fields> => ({ name, attributes, fields })

/**
 * Declares a tagged format from its variants, in dispatch order.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const format = <const Variants extends ReadonlyArray<VariantDeclaration>>(
  name: string,
  variants: Variants,
): FormatDeclaration<Variants> => ({ name, shape: "variants", variants })

/**
 * Declares a single fixed record shape. Kept so front-ends can report what
 * they read; the compiler rejects it.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const struct = <const Fields extends ReadonlyArray<FieldDeclaration>>(
  name: string,
  fields: Fields,
): FormatDeclaration<readonly [VariantDeclaration<string, Fields>]> => ({
  name,
  shape: "struct",
  variants: [{ name, attributes: [], fields }],
})
