import { describe, expect, it } from "vitest";
import { STATIC_DISCOVERY_ENV } from "../../constants.js";
import { resolveStaticDiscoveryFlag } from "../../flags.js";

describe("resolveStaticDiscoveryFlag", () => {
  it("should be off when the variable is unset", () => {
    expect(resolveStaticDiscoveryFlag({})).toBe(false);
  });

  it.each(["1", "true", "TRUE", "yes", " on "])("should switch on for %j", (value) => {
    expect(resolveStaticDiscoveryFlag({ [STATIC_DISCOVERY_ENV]: value })).toBe(true);
  });

  it.each(["0", "false", "off", "", "enabled"])("should stay off for %j", (value) => {
    expect(resolveStaticDiscoveryFlag({ [STATIC_DISCOVERY_ENV]: value })).toBe(false);
  });

  it("should let an explicit setting win over the environment", () => {
    expect(resolveStaticDiscoveryFlag({ [STATIC_DISCOVERY_ENV]: "1" }, false)).toBe(false);
    expect(resolveStaticDiscoveryFlag({}, true)).toBe(true);
  });
});
