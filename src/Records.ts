/**
 * Record streams.
 *
 * Applies a compiled parser to whole files: lines are numbered as they appear
 * in the input (starting at 1), blank lines are skipped, and the first bad
 * record fails the stream with its line number.
 *
 * @since 0.1.0
 */

import { Chunk, Data, Effect, Stream } from "effect"
import type { RecordParser } from "./Dispatcher.js"
import type { RecordParseError } from "./RecordErrors.js"

/**
 * @category Errors
 * @since 0.1.0
 */
export class RecordLineError extends Data.TaggedError("RecordLineError")<{
  readonly line: number
  readonly reason: RecordParseError
}> {
  override get message(): string {
    return `line ${this.line}: ${this.reason.message}`
  }
}

/**
 * Parses a stream of lines (without terminators).
 *
 * @category Streams
 * @since 0.1.0
 */
export const parseLines =
  <A>(parser: RecordParser<A>) =>
  <E, R>(lines: Stream.Stream<string, E, R>): Stream.Stream<A, E | RecordLineError, R> =>
    lines.pipe(
      Stream.zipWithIndex,
      Stream.filter(([line]) => line.length > 0),
      Stream.mapEffect(([line, index]) =>
        Effect.mapError(parser.parseEffect(line), (reason) => new RecordLineError({ line: index + 1, reason })),
      ),
    )

/**
 * Parses a stream of text chunks, splitting it on LF or CRLF.
 *
 * @category Streams
 * @since 0.1.0
 */
export const parseText =
  <A>(parser: RecordParser<A>) =>
  <E, R>(text: Stream.Stream<string, E, R>): Stream.Stream<A, E | RecordLineError, R> =>
    text.pipe(Stream.splitLines, parseLines(parser))

/**
 * Parses a whole document held in memory.
 *
 * @category Streams
 * @since 0.1.0
 * @example
 * ```ts
 * const records = yield* parseAll(parser, "HDAlice     030\nHDBob       041\n")
 * ```
 */
export const parseAll = <A>(parser: RecordParser<A>, input: string): Effect.Effect<ReadonlyArray<A>, RecordLineError> =>
  Stream.make(input).pipe(parseText(parser), Stream.runCollect, Effect.map(Chunk.toReadonlyArray))
