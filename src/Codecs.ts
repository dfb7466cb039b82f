/**
 * Field codecs for fixed-width text.
 *
 * Every codec decodes the exact slice of a field and encodes back to text.
 * Numeric codecs are strict: blanks inside the slice fail to decode.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"
import { InvalidScaleError } from "./Errors.js"

const Digits = Schema.String.pipe(Schema.pattern(/^[+-]?\d+$/)).annotations({ identifier: "Digits" })

const SafeDigits = Digits.pipe(
  Schema.filter((text) => Number.isSafeInteger(Number(text)), {
    message: () => "Expected digits within the safe integer range",
  }),
)

const DecimalText = Schema.String.pipe(
  Schema.pattern(/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/),
).annotations({ identifier: "DecimalText" })

/**
 * The slice exactly as it appears in the line.
 *
 * @category Codecs
 * @since 0.1.0
 */
export const Text = Schema.String

/**
 * Right-padded text with trailing blanks removed.
 *
 * @category Codecs
 * @since 0.1.0
 */
export const PaddedText = Schema.transform(Schema.String, Schema.String, {
  strict: true,
  decode: (text) => text.trimEnd(),
  encode: (text) => text,
})

/**
 * Text with blanks removed on both sides.
 *
 * @category Codecs
 * @since 0.1.0
 */
export const TrimmedText = Schema.Trim

/**
 * Optional sign followed by digits, e.g. `030` or `-12`.
 *
 * @category Codecs
 * @since 0.1.0
 */
export const Integer = Schema.transform(Digits, Schema.Int, {
  strict: true,
  decode: (text) => Number(text),
  encode: (value) => String(value),
})

/**
 * Decimal number such as `12.50`, `-.5` or `1e3`.
 *
 * @category Codecs
 * @since 0.1.0
 */
export const Decimal = Schema.transform(DecimalText, Schema.Number.pipe(Schema.finite()), {
  strict: true,
  decode: (text) => Number(text),
  encode: (value) => String(value),
})

/**
 * Integer of any size.
 *
 * @category Codecs
 * @since 0.1.0
 */
export const BigInteger = Schema.compose(Digits, Schema.BigInt)

/**
 * Digits carrying an implied decimal point `scale` places from the right, as
 * in mainframe amounts: `impliedDecimal(2)` decodes `0012345` to `123.45`.
 * Digits past the safe integer range fail to decode. Throws
 * `InvalidScaleError` unless `scale` is a non-negative integer.
 *
 * @category Codecs
 * @since 0.1.0
 */
export const impliedDecimal = (scale: number) => {
  if (!Number.isSafeInteger(scale) || scale < 0) {
    throw new InvalidScaleError({ scale })
  }
  return Schema.transform(SafeDigits, Schema.Number.pipe(Schema.finite()), {
    strict: true,
    decode: (text) => Number(text) / 10 ** scale,
    encode: (value) => Math.round(value * 10 ** scale).toString(),
  })
}
