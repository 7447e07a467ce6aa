import { describe, it, expect, afterEach } from "vitest";
import { getOutputMode } from "./mode.js";
import { initContext, isJsonMode, isQuietMode, resetContext } from "../cli-context.js";

describe("getOutputMode", () => {
  it("prefers JSON from the flag or the environment", () => {
    expect(getOutputMode(["node", "cli", "--json"], {}, true)).toBe("json");
    expect(getOutputMode([], { ZENODO_MIRROR_JSON: "true" }, true)).toBe("json");
  });

  it("uses static output in CI, pipes and dumb terminals", () => {
    expect(getOutputMode([], { CI: "1" }, true)).toBe("static");
    expect(getOutputMode([], {}, false)).toBe("static");
    expect(getOutputMode([], { TERM: "dumb" }, true)).toBe("static");
  });

  it("uses the interactive mode otherwise", () => {
    expect(getOutputMode([], {}, true)).toBe("tui");
  });
});

describe("initContext", () => {
  afterEach(() => {
    resetContext();
  });

  it("turns on quiet with JSON", () => {
    initContext(["node", "cli", "--json"], {});

    expect(isJsonMode()).toBe(true);
    expect(isQuietMode()).toBe(true);
  });

  it("reads the environment switches", () => {
    initContext([], { ZENODO_MIRROR_QUIET: "1" });

    expect(isJsonMode()).toBe(false);
    expect(isQuietMode()).toBe(true);
  });

  it("defaults to human output", () => {
    initContext([], {});

    expect(isJsonMode()).toBe(false);
    expect(isQuietMode()).toBe(false);
  });
});
