import path from "path";
import { describe, it, expect } from "vitest";
import { loadConfig } from "./config";
import { InvalidArgumentError } from "./errors";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      maxTurns: 100,
      defaultSeed: undefined,
      customDexFile: path.resolve(process.cwd(), "data", "customdex.json"),
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({ PORT: "8080", BATTLE_MAX_TURNS: "25", BATTLE_SEED: "0", CUSTOM_DEX_FILE: "/tmp/dex.json" });
    expect(config).toEqual({ port: 8080, maxTurns: 25, defaultSeed: 0, customDexFile: "/tmp/dex.json" });
  });

  it("rejects invalid numbers", () => {
    expect(() => loadConfig({ BATTLE_MAX_TURNS: "0" })).toThrow('BATTLE_MAX_TURNS must be an integer >= 1, got "0"');
    expect(() => loadConfig({ PORT: "abc" })).toThrow(InvalidArgumentError);
    expect(() => loadConfig({ BATTLE_SEED: "-3" })).toThrow(InvalidArgumentError);
  });
});
