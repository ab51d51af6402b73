import { describe, expect, test, vi } from "vitest"
import { authenticateUpgrade, extractBearerToken } from "./middleware.js"
import type { TokenVerifier } from "./types.js"

describe("extractBearerToken", () => {
  test("reads the token query parameter", () => {
    expect(
      extractBearerToken({ url: "/ws/r1?token=abc.def.ghi", headers: {} }),
    ).toBe("abc.def.ghi")
  })

  test("falls back to the Authorization header", () => {
    expect(
      extractBearerToken({
        url: "/ws",
        headers: { authorization: "Bearer header-token" },
      }),
    ).toBe("header-token")
  })

  test("prefers the query parameter when both are present", () => {
    expect(
      extractBearerToken({
        url: "/ws?token=query-token",
        headers: { authorization: "Bearer header-token" },
      }),
    ).toBe("query-token")
  })

  test("falls back to the header when the request target is not a URL", () => {
    expect(
      extractBearerToken({
        url: "//[",
        headers: { authorization: "Bearer header-token" },
      }),
    ).toBe("header-token")
    expect(extractBearerToken({ url: "//[", headers: {} })).toBeNull()
  })

  test("ignores non-bearer authorization schemes", () => {
    expect(
      extractBearerToken({
        url: "/ws",
        headers: { authorization: "Basic bW86Ym8=" },
      }),
    ).toBeNull()
  })
})

describe("authenticateUpgrade", () => {
  test("passes the extracted token to the verifier", () => {
    const verify = vi.fn<TokenVerifier>(() => ({
      ok: true,
      identity: { subject: "alice", expiresAt: 0 },
    }))

    const result = authenticateUpgrade(
      { url: "/ws?token=t1", headers: {} },
      verify,
    )

    expect(verify).toHaveBeenCalledWith("t1")
    expect(result.ok).toBe(true)
  })
})
