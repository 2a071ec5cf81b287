import { describe, it, expect, afterEach } from "vitest";
import {
  initContext,
  getContext,
  isJsonMode,
  isQuietMode,
  canPrompt,
  shouldAutoConfirm,
  resetContext,
} from "./cli-context.js";

describe("cli-context", () => {
  afterEach(() => {
    resetContext();
  });

  it("defaults to everything off", () => {
    const ctx = initContext(["node", "hubget", "get", "x"], {});
    expect(ctx).toEqual({ json: false, quiet: false, yes: false, noInput: false });
  });

  it("--json implies quiet", () => {
    initContext(["node", "hubget", "--json"], {});
    expect(isJsonMode()).toBe(true);
    expect(isQuietMode()).toBe(true);
  });

  it("reads short flags", () => {
    initContext(["node", "hubget", "-q", "-y"], {});
    expect(isQuietMode()).toBe(true);
    expect(shouldAutoConfirm()).toBe(true);
  });

  it("reads environment overrides", () => {
    initContext(["node", "hubget"], { HUBGET_YES: "true", HUBGET_QUIET: "1", CI: "1" });
    expect(getContext()).toEqual({ json: false, quiet: true, yes: true, noInput: true });
  });

  it("ignores unrecognised env values", () => {
    initContext(["node", "hubget"], { HUBGET_JSON: "yes" });
    expect(isJsonMode()).toBe(false);
  });

  describe("canPrompt", () => {
    it("allows prompting on a TTY by default", () => {
      initContext(["node", "hubget"], {});
      expect(canPrompt(true)).toBe(true);
    });

    it("refuses without a TTY", () => {
      initContext(["node", "hubget"], {});
      expect(canPrompt(false)).toBe(false);
    });

    it("refuses with --no-input or --json", () => {
      initContext(["node", "hubget", "--no-input"], {});
      expect(canPrompt(true)).toBe(false);
      initContext(["node", "hubget", "--json"], {});
      expect(canPrompt(true)).toBe(false);
    });
  });
});
