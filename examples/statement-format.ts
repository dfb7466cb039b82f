import { Integer, PaddedText, TrimmedText, impliedDecimal } from "../src/Codecs.js"
import { endsAt, field, format, length, startsAt, tag, variant } from "../src/Declaration.js"

export const buildStatementFormat = () =>
  format("Statement", [
    variant("Header", [tag("H")], [
      field("account", TrimmedText, startsAt(1), length(10)),
      field("holder", PaddedText, length(20)),
    ]),
    variant("Entry", [tag("E")], [
      field("day", Integer, startsAt(1), length(2)),
      field("memo", PaddedText, length(16)),
      field("amount", impliedDecimal(2), endsAt(28)),
    ]),
    variant("Footer", [tag("F")], [
      field("entries", Integer, startsAt(1), length(5)),
    ]),
  ])
