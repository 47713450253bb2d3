import { describe, it, expect } from "vitest"
import { loadEnv } from "@/src/utils/env"

describe("loadEnv", () => {
  it("reads GITORADE_DEBUG as a flag", () => {
    expect(loadEnv({ GITORADE_DEBUG: "1" }).GITORADE_DEBUG).toBe(true)
    expect(loadEnv({ GITORADE_DEBUG: " True " }).GITORADE_DEBUG).toBe(true)
    expect(loadEnv({ GITORADE_DEBUG: "on" }).GITORADE_DEBUG).toBe(true)
    expect(loadEnv({ GITORADE_DEBUG: "0" }).GITORADE_DEBUG).toBe(false)
    expect(loadEnv({}).GITORADE_DEBUG).toBe(false)
  })
})
