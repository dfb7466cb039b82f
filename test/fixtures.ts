import { Either, Logger, Schema } from "effect"
import { Integer, PaddedText, Text } from "../src/Codecs.js"
import { endsAt, field, format, length, startsAt, tag, variant } from "../src/Declaration.js"

/**
 * Two-record format used across the suite.
 *
 * `HD`: name [2, 12), age [12, 15)
 * `TR`: count [2, 8)
 */
export const Person = format("Person", [
  variant("Header", [tag("HD")], [
    field("name", Text, startsAt(2), length(10)),
    field("age", Integer, length(3)),
  ]),
  variant("Trailer", [tag("TR")], [field("count", Integer, startsAt(2), endsAt(8))]),
])

/**
 * Same layout as `Person` with padded names.
 */
export const PaddedPerson = format("PaddedPerson", [
  variant("Header", [tag("HD")], [
    field("name", PaddedText, startsAt(2), length(10)),
    field("age", Integer, length(3)),
  ]),
])

/**
 * Codec that records every slice it is asked to decode.
 */
export const makeSpy = () => {
  const seen: Array<string> = []
  const codec = Schema.transform(Schema.String, Schema.String, {
    strict: true,
    decode: (text) => {
      seen.push(text)
      return text
    },
    encode: (text) => text,
  })
  return { seen, codec }
}

/**
 * Logger collecting warning messages as plain strings.
 */
export const captureWarnings = () => {
  const messages: Array<string> = []
  const logger = Logger.make(({ logLevel, message }) => {
    if (logLevel._tag === "Warning") {
      messages.push(Array.isArray(message) ? message.join(" ") : String(message))
    }
  })
  return { messages, layer: Logger.replace(Logger.defaultLogger, logger) }
}

export const leftOf = <A, E>(result: Either.Either<A, E>): E => Either.getOrThrow(Either.flip(result))
