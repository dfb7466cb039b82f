import { Effect } from "effect"
import { readFileSync } from "node:fs"
import { resolve } from "node:path"
import { compileFormat } from "../src/Compiler.js"
import { printLayout } from "../src/Layout.js"
import { parseAll } from "../src/Records.js"
import { buildStatementFormat } from "./statement-format.js"

const inputPath = resolve(process.argv[2] ?? "examples/statement.txt")

const program = Effect.gen(function* () {
  const parser = yield* compileFormat(buildStatementFormat())
  yield* Effect.log(`\n${printLayout(parser.layout)}`)

  const text = yield* Effect.sync(() => readFileSync(inputPath, "utf-8"))
  const records = yield* parseAll(parser, text)

  let balance = 0
  for (const record of records) {
    switch (record._tag) {
      case "Header":
        yield* Effect.log(`Account ${record.account} (${record.holder})`)
        break
      case "Entry":
        balance += record.amount
        yield* Effect.log(`${String(record.day).padStart(2, "0")} ${record.memo.padEnd(16)} ${record.amount.toFixed(2)}`)
        break
      case "Footer":
        yield* Effect.log(`${record.entries} entries, balance ${balance.toFixed(2)}`)
        break
    }
  }
})

Effect.runPromise(program).catch((error) => {
  console.error("Failed to read statement", error)
  process.exitCode = 1
})
