import { describe, it, expect } from "vitest"
import { endsAt, length, startsAt } from "../../src/Declaration.js"
import { foldPositionHints } from "../../src/internal/cursor.js"

describe("foldPositionHints", () => {
  it("starts at the cursor and advances it by the length", () => {
    expect(foldPositionHints(10, [length(4)])).toEqual({ from: 10, to: 14, length: 4, cursor: 14 })
  })

  it("pins the start and advances the cursor when a length follows", () => {
    expect(foldPositionHints(10, [startsAt(2), length(4)])).toEqual({ from: 2, to: 6, length: 4, cursor: 6 })
  })

  it("does not move the cursor for a start given after the length", () => {
    expect(foldPositionHints(10, [length(4), startsAt(2)])).toEqual({ from: 2, to: 6, length: 4, cursor: 14 })
  })

  it("derives the length from an explicit end", () => {
    expect(foldPositionHints(3, [endsAt(9)])).toEqual({ from: 3, to: 9, length: 6, cursor: 9 })
  })

  it("keeps the width when the start moves after an end", () => {
    expect(foldPositionHints(0, [endsAt(10), startsAt(4)])).toEqual({ from: 4, to: 14, length: 10, cursor: 10 })
  })

  it("lets later hints of the same kind override earlier ones", () => {
    expect(foldPositionHints(0, [length(4), length(7)])).toEqual({ from: 0, to: 7, length: 7, cursor: 7 })
  })

  it("resolves a start alone to an empty range without moving the cursor", () => {
    expect(foldPositionHints(8, [startsAt(5)])).toEqual({ from: 5, to: 5, length: 0, cursor: 8 })
  })

  it("ignores unrecognized attributes", () => {
    const step = foldPositionHints(1, [
      { _tag: "Unrecognized", name: "picture", value: { _tag: "StringLiteral", value: "X(4)" } },
      length(4),
    ])
    expect(step).toEqual({ from: 1, to: 5, length: 4, cursor: 5 })
  })

  it("produces an empty range without hints", () => {
    expect(foldPositionHints(6, [])).toEqual({ from: 6, to: 6, length: 0, cursor: 6 })
  })
})
