import { describe, it, expect } from "@effect/vitest"
import { ConfigError, ConfigProvider, Effect, Either, Layer } from "effect"
import { Integer, Text } from "../src/Codecs.js"
import { compileFormat, compileFormatEither, FormatCompiler } from "../src/Compiler.js"
import { CompilerConfig, defaultCompilerOptions } from "../src/CompilerConfig.js"
import { field, format, length, startsAt, struct, tag, variant } from "../src/Declaration.js"
import { captureWarnings, leftOf, Person } from "./fixtures.js"

const Twice = format("Twice", [
  variant("First", [tag("HD")], [field("a", Text, startsAt(2), length(1))]),
  variant("Second", [tag("HD")], [field("b", Text, startsAt(2), length(1))]),
])

const fromMap = (entries: ReadonlyArray<readonly [string, string]>) =>
  ConfigProvider.fromMap(new Map(entries))

const compilerLayer = FormatCompiler.layer.pipe(Layer.provide(CompilerConfig.layer))

describe("compileFormat", () => {
  it.effect("produces a parser bound to the resolved layout", () =>
    Effect.gen(function* () {
      const parser = yield* compileFormat(Person)

      expect(parser.format).toBe("Person")
      expect(parser.errorName).toBe("PersonParseError")
      expect(parser.layout.tagLength).toBe(2)
      expect(parser.layout.variants.map((v) => v.name)).toEqual(["Header", "Trailer"])
    }),
  )

  it.effect("fails on a structural defect before validating", () =>
    Effect.gen(function* () {
      const declaration = {
        ...format("F", [variant("A", [tag("AB")], [field("x", Text, length(-2))])]),
        shape: "struct" as const,
      }
      const error = yield* Effect.flip(compileFormat(declaration))

      expect(error._tag).toBe("MalformedDeclarationError")
    }),
  )

  it.effect("fails on a validation defect", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(compileFormat(struct("Line", [field("text", Text, length(4))])))

      expect(error._tag).toBe("NotAVariantFormatError")
    }),
  )

  it.effect("fails on a zero-length field", () =>
    Effect.gen(function* () {
      const declaration = format("F", [variant("Header", [tag("HD")], [field("pad", Text, length(0))])])
      const error = yield* Effect.flip(compileFormat(declaration))

      expect(error).toMatchObject({ _tag: "ZeroLengthFieldError", variant: "Header", field: "pad" })
    }),
  )

  it.effect("warns about duplicate tags by default", () =>
    Effect.gen(function* () {
      const { messages, layer } = captureWarnings()
      yield* compileFormat(Twice).pipe(Effect.provide(layer))

      expect(messages).toEqual(['Tag "HD" is declared by First, Second; First takes precedence'])
    }),
  )

  it.effect("compiles duplicate tags silently when allowed", () =>
    Effect.gen(function* () {
      const { messages, layer } = captureWarnings()
      yield* compileFormat(Twice, { duplicateTags: "allow" }).pipe(Effect.provide(layer))

      expect(messages).toEqual([])
    }),
  )
})

describe("compileFormatEither", () => {
  it("returns the parser on success", () => {
    const parser = Either.getOrThrow(compileFormatEither(Person))

    expect(Either.getOrThrow(parser.parse("TR000003"))).toEqual({ _tag: "Trailer", count: 3 })
  })

  it("returns the defect on failure", () => {
    const declaration = format("F", [
      variant("A", [tag("AA")], [field("x", Integer, length(1))]),
      variant("B", [tag("B")], [field("y", Integer, length(1))]),
    ])

    expect(leftOf(compileFormatEither(declaration))).toMatchObject({ _tag: "TagLengthMismatchError", variant: "B" })
  })

  it("returns an out-of-range field as a defect", () => {
    const declaration = format("F", [
      variant("A", [tag("AA")], [field("x", Text, startsAt(Number.MAX_SAFE_INTEGER), length(10))]),
    ])

    expect(leftOf(compileFormatEither(declaration))).toMatchObject({ _tag: "FieldRangeOverflowError", field: "x" })
  })
})

describe("CompilerConfig", () => {
  it.effect("falls back to the defaults", () =>
    Effect.gen(function* () {
      const options = yield* CompilerConfig

      expect(options).toEqual(defaultCompilerOptions)
    }).pipe(Effect.provide(CompilerConfig.layer), Effect.withConfigProvider(fromMap([]))),
  )

  it.effect("reads settings from the config provider", () =>
    Effect.gen(function* () {
      const options = yield* CompilerConfig

      expect(options).toEqual({ duplicateTags: "allow", truncatedFields: "slice" })
    }).pipe(
      Effect.provide(CompilerConfig.layer),
      Effect.withConfigProvider(
        fromMap([
          ["FIXED_LENGTH.DUPLICATE_TAGS", "allow"],
          ["FIXED_LENGTH.TRUNCATED_FIELDS", "slice"],
        ]),
      ),
    ),
  )

  it.effect("rejects an unknown setting value", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        Effect.provide(CompilerConfig, CompilerConfig.layer).pipe(
          Effect.withConfigProvider(fromMap([["FIXED_LENGTH.TRUNCATED_FIELDS", "pad"]])),
        ),
      )

      expect(ConfigError.isConfigError(error)).toBe(true)
    }),
  )
})

describe("FormatCompiler", () => {
  it.effect("compiles with the configured settings", () =>
    Effect.gen(function* () {
      const compiler = yield* FormatCompiler
      const parser = yield* compiler.compile(Person)

      expect(compiler.options.truncatedFields).toBe("slice")
      expect(Either.getOrThrow(parser.parse("TR0042"))).toEqual({ _tag: "Trailer", count: 42 })
    }).pipe(
      Effect.provide(compilerLayer),
      Effect.withConfigProvider(fromMap([["FIXED_LENGTH.TRUNCATED_FIELDS", "slice"]])),
    ),
  )

  it.effect("accepts explicit options", () =>
    Effect.gen(function* () {
      const compiler = yield* FormatCompiler
      const parser = yield* compiler.compile(Person)

      expect(leftOf(parser.parse("TR0042"))).toMatchObject({ field: "count" })
    }).pipe(Effect.provide(FormatCompiler.layer.pipe(Layer.provide(CompilerConfig.withOptions({ truncatedFields: "fail" }))))),
  )
})
