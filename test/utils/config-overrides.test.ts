import { describe, it, expect } from "vitest"
import { extractConfigOverrides } from "@/src/utils/config-overrides"
import { MissingArgumentError } from "@/src/utils/errors"

describe("extractConfigOverrides", () => {
  it("maps underscores to dots and keeps insertion order", () => {
    const { overrides, argv } = extractConfigOverrides([
      "--core_autocrlf",
      "true",
      "-m",
      "msg",
      "--core_eol=lf",
      "a.txt",
    ])

    expect(Object.entries(overrides)).toEqual([
      ["core.autocrlf", "true"],
      ["core.eol", "lf"],
    ])
    expect(argv).toEqual(["-m", "msg", "a.txt"])
  })

  it("handles subsections and dashed keys", () => {
    const { overrides } = extractConfigOverrides(["--branch_main_merge-options", "--no-ff"])
    expect(overrides).toEqual({ "branch.main.merge-options": "--no-ff" })
  })

  it("does not treat a value of a known flag as an override", () => {
    const { overrides, argv } = extractConfigOverrides(
      ["-m", "--user_name", "file.txt"],
      new Set(["-m"])
    )
    expect(overrides).toEqual({})
    expect(argv).toEqual(["-m", "--user_name", "file.txt"])
  })

  it("reads a short flag cluster ending in a value flag as taking the next argument", () => {
    const valueFlags = new Set(["-m", "-p"])

    expect(extractConfigOverrides(["-dm", "--user_name", "a.txt"], valueFlags)).toEqual({
      overrides: {},
      argv: ["-dm", "--user_name", "a.txt"],
    })
  })

  it("reads the next argument normally when the cluster carries its value inline", () => {
    // -md: m takes "d", so --user_name is an override again
    expect(extractConfigOverrides(["-md", "--user_name", "Jane"], new Set(["-m"]))).toEqual({
      overrides: { "user.name": "Jane" },
      argv: ["-md"],
    })
  })

  it("leaves plain options and everything after -- untouched", () => {
    const { overrides, argv } = extractConfigOverrides(["--debug", "--", "--core_eol", "lf"])
    expect(overrides).toEqual({})
    expect(argv).toEqual(["--debug", "--", "--core_eol", "lf"])
  })

  it("rejects an override without a value", () => {
    expect(() => extractConfigOverrides(["--user_email"])).toThrow(MissingArgumentError)
    expect(() => extractConfigOverrides(["--user_email"])).toThrow(
      "option '--user_email <value>' argument missing"
    )
  })

  it("accepts an explicit empty value", () => {
    expect(extractConfigOverrides(["--commit_template="]).overrides).toEqual({
      "commit.template": "",
    })
  })
})
