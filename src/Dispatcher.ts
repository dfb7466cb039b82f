/**
 * Tag dispatch.
 *
 * Interprets a resolved layout at call time: read the tag, pick the first
 * variant declaring it, then slice and decode the fields left to right. The
 * first field that fails to decode ends the parse; there is no fallback to
 * another variant.
 *
 * @since 0.1.0
 */

import { Array as Arr, Effect, Either, ParseResult, Schema } from "effect"
import type { FieldCodec } from "./Declaration.js"
import type { ResolvedLayout, ResolvedVariant } from "./Layout.js"
import { CodecCountMismatchError } from "./Errors.js"
import { makeErrorModel, type RecordParseError } from "./RecordErrors.js"

/**
 * What to do with a field whose range runs past the end of the line.
 *
 * @category Models
 * @since 0.1.0
 */
export type TruncatedFieldPolicy = "fail" | "slice"

/**
 * A resolved variant and the codecs of its fields, in field order.
 *
 * @category Models
 * @since 0.1.0
 */
export interface DispatchArm {
  readonly variant: ResolvedVariant
  readonly codecs: ReadonlyArray<FieldCodec>
}

/**
 * Compiled parser for one format.
 *
 * @category Models
 * @since 0.1.0
 */
export interface RecordParser<A> {
  readonly format: string
  readonly errorName: string
  readonly layout: ResolvedLayout
  readonly parse: (line: string) => Either.Either<A, RecordParseError>
  readonly parseEffect: (line: string) => Effect.Effect<A, RecordParseError>
}

interface FieldReader {
  readonly name: string
  readonly from: number
  readonly to: number
  readonly decode: (text: string) => Either.Either<unknown, ParseResult.ParseError>
}

interface ArmReader {
  readonly variant: string
  readonly tag: string
  readonly fields: ReadonlyArray<FieldReader>
}

const makeArmReader = ({ variant, codecs }: DispatchArm): ArmReader => {
  if (codecs.length !== variant.fields.length) {
    throw new CodecCountMismatchError({
      variant: variant.name,
      expected: variant.fields.length,
      received: codecs.length,
    })
  }
  const fields = Arr.zipWith(variant.fields, codecs, (resolved, codec) => ({
    name: resolved.name,
    from: resolved.from,
    to: resolved.to,
    decode: Schema.decodeUnknownEither(codec),
  }))
  return { variant: variant.name, tag: variant.tag, fields }
}

/**
 * Builds the parser for a layout. When several arms share a tag the first one
 * is used. Throws `CodecCountMismatchError` when an arm's codecs do not match
 * its fields one to one.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeDispatcher = <A>(
  layout: ResolvedLayout,
  arms: ReadonlyArray<DispatchArm>,
  truncatedFields: TruncatedFieldPolicy,
): RecordParser<A> => {
  const errors = makeErrorModel(layout.format)
  const table = new Map<string, ArmReader>()
  for (const arm of arms) {
    if (!table.has(arm.variant.tag)) {
      table.set(arm.variant.tag, makeArmReader(arm))
    }
  }

  const parse = (line: string): Either.Either<A, RecordParseError> => {
    if (line.length < layout.tagLength) {
      return Either.left(errors.invalidTag())
    }
    const arm = table.get(line.slice(0, layout.tagLength))
    if (arm === undefined) {
      return Either.left(errors.invalidTag())
    }

    const record: Record<string, unknown> = { _tag: arm.variant }
    for (const field of arm.fields) {
      if (truncatedFields === "fail" && line.length < field.to) {
        return Either.left(errors.fieldFailure(arm.tag, field.name))
      }
      const decoded = field.decode(line.slice(field.from, field.to))
      if (Either.isLeft(decoded)) {
        return Either.left(errors.fieldFailure(arm.tag, field.name))
      }
      record[field.name] = decoded.right
    }
    // the record carries `_tag` plus one decoded value per declared field
    return Either.right(record as A)
  }

  return {
    format: layout.format,
    errorName: errors.name,
    layout,
    parse,
    parseEffect: (line) =>
      Either.match(parse(line), {
        onLeft: (error): Effect.Effect<A, RecordParseError> => Effect.fail(error),
        onRight: (record) => Effect.succeed(record),
      }),
  }
}
