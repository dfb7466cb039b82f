/**
 * Compiler settings.
 *
 * Read from the ambient `ConfigProvider` (environment variables by default)
 * under the `FIXED_LENGTH` prefix:
 *
 * - `FIXED_LENGTH_DUPLICATE_TAGS`: `warn` (default) or `allow`
 * - `FIXED_LENGTH_TRUNCATED_FIELDS`: `fail` (default) or `slice`
 *
 * @since 0.1.0
 */

import { Config, Context, Effect, Layer } from "effect"
import type { TruncatedFieldPolicy } from "./Dispatcher.js"
import type { DuplicateTagPolicy } from "./Validator.js"

/**
 * @category Models
 * @since 0.1.0
 */
export interface CompilerOptions {
  readonly duplicateTags: DuplicateTagPolicy
  readonly truncatedFields: TruncatedFieldPolicy
}

/**
 * @category Constants
 * @since 0.1.0
 */
export const defaultCompilerOptions: CompilerOptions = {
  duplicateTags: "warn",
  truncatedFields: "fail",
}

/**
 * @category Config
 * @since 0.1.0
 */
export const compilerOptionsConfig: Config.Config<CompilerOptions> = Config.all({
  duplicateTags: Config.literal("warn", "allow")("DUPLICATE_TAGS").pipe(
    Config.withDefault(defaultCompilerOptions.duplicateTags),
  ),
  truncatedFields: Config.literal("fail", "slice")("TRUNCATED_FIELDS").pipe(
    Config.withDefault(defaultCompilerOptions.truncatedFields),
  ),
}).pipe(Config.nested("FIXED_LENGTH"))

/**
 * Context tag carrying the settings used by `FormatCompiler`.
 *
 * @category Services
 * @since 0.1.0
 */
export class CompilerConfig extends Context.Tag("fixed-length-records/CompilerConfig")<
  CompilerConfig,
  CompilerOptions
>() {
  /**
   * Settings loaded from configuration.
   *
   * @example
   * ```ts
   * program.pipe(
   *   Effect.provide(FormatCompiler.layer.pipe(Layer.provide(CompilerConfig.layer))),
   * )
   * ```
   */
  static readonly layer = Layer.effect(
    this,
    Effect.gen(function* () {
      return yield* compilerOptionsConfig
    }),
  )

  static readonly Default = Layer.succeed(this, defaultCompilerOptions)

  static readonly withOptions = (options: Partial<CompilerOptions>) =>
    Layer.succeed(this, { ...defaultCompilerOptions, ...options })
}
