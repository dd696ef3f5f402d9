import { describe, it, expect } from "vitest";
import { Effect, LogLevel } from "effect";
import { Registry, oneOf, regionPoints } from "@ocrsets/core";
import { parseLogLevel, withSpan } from "@ocrsets/effect-runtime";

describe("parseLogLevel", () => {
  it("maps names case-insensitively and defaults to info", () => {
    expect(parseLogLevel("DEBUG")).toBe(LogLevel.Debug);
    expect(parseLogLevel("warn")).toBe(LogLevel.Warning);
    expect(parseLogLevel("none")).toBe(LogLevel.None);
    expect(parseLogLevel("chatty")).toBe(LogLevel.Info);
  });
});

describe("withSpan", () => {
  it("runs the effect inside a named span", () => {
    const span = Effect.runSync(withSpan("dataset.borndigital", Effect.currentSpan));
    expect(span.name).toBe("dataset.borndigital");
  });
});

describe("Registry", () => {
  it("looks up registered values and lists names in order", () => {
    const reg = new Registry<number>("widget");
    reg.register("one", 1);
    reg.register("two", 2);
    expect(Effect.runSync(reg.get("two"))).toBe(2);
    expect(reg.has("three")).toBe(false);
    expect(reg.list()).toEqual(["one", "two"]);
  });

  it("names the alternatives for an unknown key", async () => {
    const reg = new Registry<number>("widget");
    reg.register("one", 1);
    const err = await Effect.runPromise(Effect.flip(reg.get("zero")));
    expect(err.message).toBe('[widget] Unknown widget "zero". Available: one');
  });
});

describe("oneOf", () => {
  it("accepts a listed choice", () => {
    expect(Effect.runSync(oneOf("mode", "b", ["a", "b"] as const))).toBe("b");
  });

  it("rejects anything else", async () => {
    const err = await Effect.runPromise(Effect.flip(oneOf("mode", "c", ["a", "b"] as const)));
    expect(err.message).toBe('Unsupported mode: "c". Expected one of: a, b');
  });
});

describe("regionPoints", () => {
  it("expands a box clockwise from its origin", () => {
    expect(regionPoints({ kind: "box", x: 1, y: 2, width: 3, height: 4 })).toEqual([[1, 2], [4, 2], [4, 6], [1, 6]]);
  });
});
