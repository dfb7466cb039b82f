/**
 * Format compiler.
 *
 * Runs a declaration through the whole pipeline (structure check, validation,
 * offset resolution, error model, dispatcher) and hands back a ready parser.
 * The first failing stage ends compilation.
 *
 * @since 0.1.0
 */

import { Array as Arr, Context, Effect, Either, Layer } from "effect"
import { CompilerConfig, defaultCompilerOptions, type CompilerOptions } from "./CompilerConfig.js"
import type { FormatDeclaration, RecordOf } from "./Declaration.js"
import { makeDispatcher, type RecordParser } from "./Dispatcher.js"
import type { SchemaDefectError } from "./Errors.js"
import { resolveLayout } from "./Offsets.js"
import { checkStructure, reportDuplicateTags, validateFormat } from "./Validator.js"

/**
 * Compiles a declaration into a parser.
 *
 * @category Compilation
 * @since 0.1.0
 * @example
 * ```ts
 * const Person = format("Person", [
 *   variant("Header", [tag("HD")], [
 *     field("name", PaddedText, startsAt(2), length(10)),
 *     field("age", Integer, length(3)),
 *   ]),
 * ])
 *
 * const parser = yield* compileFormat(Person)
 * parser.parse("HDAlice     030")
 * // Either.right({ _tag: "Header", name: "Alice", age: 30 })
 * ```
 */
export const compileFormat = <D extends FormatDeclaration>(
  declaration: D,
  options: Partial<CompilerOptions> = {},
): Effect.Effect<RecordParser<RecordOf<D>>, SchemaDefectError> => {
  const settings: CompilerOptions = { ...defaultCompilerOptions, ...options }
  return Effect.gen(function* () {
    yield* checkStructure(declaration)
    const validated = yield* validateFormat(declaration)
    yield* reportDuplicateTags(validated, settings.duplicateTags)
    const layout = yield* resolveLayout(validated)
    const arms = Arr.zipWith(validated.variants, layout.variants, (source, variant) => ({
      variant,
      codecs: source.fields.map((field) => field.codec),
    }))
    yield* Effect.logDebug(`Compiled ${layout.variants.length} record types with tag width ${layout.tagLength}`)
    return makeDispatcher<RecordOf<D>>(layout, arms, settings.truncatedFields)
  }).pipe(Effect.annotateLogs("format", declaration.name))
}

/**
 * Synchronous variant of `compileFormat` for build scripts.
 *
 * @category Compilation
 * @since 0.1.0
 */
export const compileFormatEither = <D extends FormatDeclaration>(
  declaration: D,
  options: Partial<CompilerOptions> = {},
): Either.Either<RecordParser<RecordOf<D>>, SchemaDefectError> =>
  Effect.runSync(Effect.either(compileFormat(declaration, options)))

/**
 * @category Services
 * @since 0.1.0
 */
export interface FormatCompilerService {
  readonly options: CompilerOptions
  readonly compile: <D extends FormatDeclaration>(
    declaration: D,
  ) => Effect.Effect<RecordParser<RecordOf<D>>, SchemaDefectError>
}

/**
 * Compiler bound to the `CompilerConfig` in context.
 *
 * @category Services
 * @since 0.1.0
 */
export class FormatCompiler extends Context.Tag("fixed-length-records/FormatCompiler")<
  FormatCompiler,
  FormatCompilerService
>() {
  static readonly layer = Layer.effect(
    this,
    Effect.map(CompilerConfig, (options): FormatCompilerService => ({
      options,
      compile: <D extends FormatDeclaration>(declaration: D) => compileFormat(declaration, options),
    })),
  )
}
