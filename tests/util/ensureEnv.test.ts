/**
 * WHAT: Proves requireEnv returns set values and exits on missing/blank ones.
 * HOW: process.exit is stubbed to throw so the call stops where the real exit would.
 * DOCS: https://vitest.dev/guide/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { requireEnv } from "../../src/util/ensureEnv.js";

describe("requireEnv", () => {
  const KEY = "MANGODIA_TEST_REQUIRED";

  beforeEach(() => {
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`);
    });
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    delete process.env[KEY];
  });

  it("returns the trimmed value when set", () => {
    process.env[KEY] = " value ";
    expect(requireEnv(KEY)).toBe("value");
    expect(process.exit).not.toHaveBeenCalled();
  });

  it("exits with code 1 when missing", () => {
    expect(() => requireEnv(KEY)).toThrow("process.exit(1)");
    expect(console.error).toHaveBeenCalledWith(
      `[startup] ${KEY} is not set; add it to .env or the environment`
    );
  });

  it("exits when the value is only whitespace", () => {
    process.env[KEY] = "   ";
    expect(() => requireEnv(KEY)).toThrow("process.exit(1)");
  });
});
