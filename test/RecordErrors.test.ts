import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import { FieldParseError, InvalidTagError, makeErrorModel } from "../src/RecordErrors.js"

describe("record parse errors", () => {
  it("names the error type after the format", () => {
    expect(makeErrorModel("Statement").name).toBe("StatementParseError")
  })

  it("formats an invalid tag", () => {
    const error = makeErrorModel("Statement").invalidTag()

    expect(error).toBeInstanceOf(InvalidTagError)
    expect(error.message).toBe("invalid record type")
  })

  it("formats a field failure with the field and the tag", () => {
    const error = makeErrorModel("Statement").fieldFailure("HD", "age")

    expect(error).toBeInstanceOf(FieldParseError)
    expect(error).toMatchObject({ format: "Statement", recordType: "HD", field: "age" })
    expect(error.message).toBe("failed to parse field `age` in HD record.")
  })

  it("is a standard error", () => {
    const error = new FieldParseError({ format: "Statement", recordType: "TR", field: "count" })

    expect(error).toBeInstanceOf(Error)
    expect(error.message).toBe("failed to parse field `count` in TR record.")
  })

  it.effect("supports catchTag on FieldParseError", () =>
    Effect.gen(function* () {
      const handled = yield* Effect.fail(makeErrorModel("Statement").fieldFailure("HD", "age")).pipe(
        Effect.catchTag("FieldParseError", (error) => Effect.succeed(`${error.recordType}.${error.field}`)),
      )

      expect(handled).toBe("HD.age")
    }),
  )
})
