import { describe, it, expect } from "vitest"
import { formatMessage, formatShorthand, isShorthand } from "@/src/commit/format"
import { COMMIT_TYPES, isCommitType } from "@/src/commit/types"

describe("formatMessage", () => {
  it("prefixes every known commit type", () => {
    for (const type of COMMIT_TYPES) {
      expect(formatMessage("add retry logic", type)).toBe(`[${type}]: add retry logic`)
    }
  })

  it("keeps the message byte for byte", () => {
    const message = "fix  double   spaces\tand tabs "
    expect(formatMessage(message, "fix")).toBe(`[fix]: ${message}`)
  })

  it("leaves the message alone for unknown types", () => {
    expect(formatMessage("update readme", "feature")).toBe("update readme")
    expect(formatMessage("update readme", "FEAT")).toBe("update readme")
    expect(formatMessage("update readme", "")).toBe("update readme")
    expect(formatMessage("update readme")).toBe("update readme")
  })

  it("returns an empty string when there is no message", () => {
    expect(formatMessage("", "feat")).toBe("")
    expect(formatMessage(undefined, "feat")).toBe("")
    expect(formatMessage(undefined, undefined)).toBe("")
  })
})

describe("isCommitType", () => {
  it("accepts the fixed set only", () => {
    expect(isCommitType("release")).toBe(true)
    expect(isCommitType("other")).toBe(true)
    expect(isCommitType("wip")).toBe(false)
    expect(isCommitType(undefined)).toBe(false)
  })
})

describe("shorthand", () => {
  it("detects messages that start with the program name", () => {
    expect(isShorthand("gitorade fix typo")).toBe(true)
    expect(isShorthand("  gitorade fix typo")).toBe(true)
    expect(isShorthand("gitoradefix typo")).toBe(false)
    expect(isShorthand("fix gitorade typo")).toBe(false)
    expect(isShorthand(undefined)).toBe(false)
  })

  it("turns three tokens with a known tag into a tagged message", () => {
    expect(formatShorthand("gitorade fix typo")).toBe("[fix]: typo")
    expect(formatShorthand("gitorade   docs   readme")).toBe("[docs]: readme")
  })

  it("drops the program name for any other shape", () => {
    expect(formatShorthand("gitorade fix two words")).toBe("fix two words")
    expect(formatShorthand("gitorade wip typo")).toBe("wip typo")
    expect(formatShorthand("gitorade  hello")).toBe("hello")
    expect(formatShorthand("gitorade")).toBe("")
  })
})
