import { describe, expect, it } from "vitest";
import { buildKeystrokeSample } from "../index";

describe("buildKeystrokeSample", () => {
  it("maps collector metadata deterministically", () => {
    const sample = buildKeystrokeSample(
      [
        { code: "KeyA", type: "down", t: 10, expectedIndex: 0 },
        { code: "KeyA", type: "up", t: 100, expectedIndex: 0 },
      ],
      "abc",
      {
        typedLength: 3.4,
        errorCount: 1,
        backspaceCount: -2,
        ignoredEventCount: 2,
        imeCompositionUsed: false,
      }
    );

    expect(sample).toEqual({
      events: [
        { code: "KeyA", type: "down", t: 10, expectedIndex: 0 },
        { code: "KeyA", type: "up", t: 100, expectedIndex: 0 },
      ],
      expectedText: "abc",
      typedLength: 3,
      errorCount: 1,
      backspaceCount: 0,
      ignoredEventCount: 2,
      imeCompositionUsed: false,
      source: "collector_v1",
    });
  });

  it("omits what was not measured", () => {
    expect(buildKeystrokeSample([], undefined, { typedLength: Number.NaN, source: "manual" })).toEqual({
      events: [],
      source: "manual",
    });
  });
});
