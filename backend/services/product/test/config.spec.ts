// backend/services/product/test/config.spec.ts
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig } from "../src/config";

const KEYS = ["PRODUCT_PORT", "npm_package_version"] as const;

describe("loadConfig", () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const k of KEYS) saved[k] = process.env[k];
    process.env.PRODUCT_PORT = "4020";
    process.env.npm_package_version = "1.2.3";
  });

  afterEach(() => {
    for (const k of KEYS) {
      const v = saved[k];
      if (v === undefined) delete process.env[k];
      else process.env[k] = v;
    }
  });

  it("reads the service settings", () => {
    expect(loadConfig()).toEqual({ port: 4020, version: "1.2.3" });
  });

  it("leaves the version out when npm did not start the process", () => {
    delete process.env.npm_package_version;
    expect(loadConfig()).toEqual({ port: 4020, version: undefined });
  });

  it("fails fast on a missing variable", () => {
    delete process.env.PRODUCT_PORT;
    expect(() => loadConfig()).toThrow("Missing required env var: PRODUCT_PORT");
  });

  it.each(["abc", "70000", "1.5"])("rejects PRODUCT_PORT=%s", (port) => {
    process.env.PRODUCT_PORT = port;
    expect(() => loadConfig()).toThrow(/PRODUCT_PORT/);
  });
});
