/**
 * Table-driven tests for the environment readers backing the partitioner
 * defaults.
 */
import { afterEach, describe, it } from "mocha";
import { expect } from "chai";

import { readBool, readEnum, readInt, readNumber, readOptionalString } from "../../src/config/env.js";

const trackedKeys = ["KL_TEST_BOOL", "KL_TEST_NUMBER", "KL_TEST_INT", "KL_TEST_ENUM", "KL_TEST_STRING"] as const;
type TrackedKey = (typeof trackedKeys)[number];

const originalEnv = new Map<TrackedKey, string | undefined>();

function setEnv(name: TrackedKey, value: string | undefined): void {
  if (!originalEnv.has(name)) {
    originalEnv.set(name, process.env[name]);
  }
  if (value === undefined) {
    delete process.env[name];
  } else {
    process.env[name] = value;
  }
}

describe("config/env helpers", () => {
  afterEach(() => {
    for (const [key, value] of originalEnv) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    originalEnv.clear();
  });

  it("interprets boolean flags case-insensitively", () => {
    setEnv("KL_TEST_BOOL", "YES");
    expect(readBool("KL_TEST_BOOL", false)).to.equal(true);

    setEnv("KL_TEST_BOOL", "off");
    expect(readBool("KL_TEST_BOOL", true)).to.equal(false);

    setEnv("KL_TEST_BOOL", "  ");
    expect(readBool("KL_TEST_BOOL", true)).to.equal(true);
  });

  it("falls back to the default for unknown boolean literals", () => {
    setEnv("KL_TEST_BOOL", "maybe");
    expect(readBool("KL_TEST_BOOL", true)).to.equal(true);
  });

  it("parses decimal numbers within bounds", () => {
    setEnv("KL_TEST_NUMBER", "12.5");
    expect(readNumber("KL_TEST_NUMBER", 0)).to.equal(12.5);

    setEnv("KL_TEST_NUMBER", "-5");
    expect(readNumber("KL_TEST_NUMBER", 10, { min: 0 })).to.equal(10);

    setEnv("KL_TEST_NUMBER", "ten");
    expect(readNumber("KL_TEST_NUMBER", 10)).to.equal(10);

    setEnv("KL_TEST_NUMBER", "Infinity");
    expect(readNumber("KL_TEST_NUMBER", 3)).to.equal(3);
  });

  it("reads integers and rejects decimals or out-of-range values", () => {
    setEnv("KL_TEST_INT", "25");
    expect(readInt("KL_TEST_INT", 10)).to.equal(25);

    setEnv("KL_TEST_INT", "2.5");
    expect(readInt("KL_TEST_INT", 10)).to.equal(10);

    setEnv("KL_TEST_INT", "0");
    expect(readInt("KL_TEST_INT", 10, { min: 1 })).to.equal(10);

    setEnv("KL_TEST_INT", String(Number.MAX_SAFE_INTEGER + 10));
    expect(readInt("KL_TEST_INT", 10)).to.equal(10);
  });

  it("matches enum values case-insensitively", () => {
    setEnv("KL_TEST_ENUM", "DEBUG");
    expect(readEnum("KL_TEST_ENUM", ["debug", "info"] as const, "info")).to.equal("debug");

    setEnv("KL_TEST_ENUM", "verbose");
    expect(readEnum("KL_TEST_ENUM", ["debug", "info"] as const, "info")).to.equal("info");
  });

  it("trims strings and treats blanks as unset", () => {
    setEnv("KL_TEST_STRING", "  ./logs/kl.log  ");
    expect(readOptionalString("KL_TEST_STRING")).to.equal("./logs/kl.log");

    setEnv("KL_TEST_STRING", "   ");
    expect(readOptionalString("KL_TEST_STRING")).to.equal(undefined);
  });
});
