import { describe, it, expect } from "vitest";
import { loadNetworkConfig } from "../src/config.js";

describe("loadNetworkConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadNetworkConfig({})).toEqual({
      ok: true,
      value: {
        dataDir: ".streamnet",
        tributaryOrder: "added-first",
        treatDryAsNaturalFlow: false,
        logLevel: "info",
      },
    });
  });

  it("reads and normalises every variable", () => {
    const config = loadNetworkConfig({
      STREAMNET_DATA_DIR: " data ",
      STREAMNET_TRIBUTARY_ORDER: "Added-Last",
      STREAMNET_TREAT_DRY_AS_NATURAL_FLOW: "YES",
      STREAMNET_LOG_LEVEL: "debug",
    });
    expect(config.ok).toBe(true);
    if (config.ok) {
      expect(config.value).toEqual({
        dataDir: "data",
        tributaryOrder: "added-last",
        treatDryAsNaturalFlow: true,
        logLevel: "debug",
      });
    }
  });

  it("treats blank values as unset", () => {
    const config = loadNetworkConfig({ STREAMNET_DATA_DIR: "  ", STREAMNET_TRIBUTARY_ORDER: "" });
    expect(config.ok).toBe(true);
    if (config.ok) {
      expect(config.value.dataDir).toBe(".streamnet");
      expect(config.value.tributaryOrder).toBe("added-first");
    }
  });

  it("rejects an unrecognised flag", () => {
    const config = loadNetworkConfig({ STREAMNET_TREAT_DRY_AS_NATURAL_FLOW: "maybe" });
    expect(config).toEqual({
      ok: false,
      error: 'Invalid configuration: STREAMNET_TREAT_DRY_AS_NATURAL_FLOW: expected true or false, got "maybe"',
    });
  });

  it("rejects an unknown tributary order", () => {
    const config = loadNetworkConfig({ STREAMNET_TRIBUTARY_ORDER: "sideways" });
    expect(config.ok).toBe(false);
    if (!config.ok) expect(config.error).toMatch(/^Invalid configuration: STREAMNET_TRIBUTARY_ORDER: /);
  });
});
