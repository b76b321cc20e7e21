import {
  defaultDriverConfig,
  resolveDriverConfig
} from "../../src/application/crawl-partition/driver.config";

describe("driver config", () => {
  it("fills unset values from the base config", () => {
    expect(resolveDriverConfig({ maxRetries: 1, pageDelay: { maxMs: 4000 } })).toEqual({
      ...defaultDriverConfig,
      maxRetries: 1,
      pageDelay: { minMs: 200, maxMs: 4000 }
    });
  });

  it("layers overrides on a per-source base", () => {
    const base = resolveDriverConfig({ pageDelay: { minMs: 1000, maxMs: 3000 } });

    expect(resolveDriverConfig({ pageDelay: { minMs: undefined, maxMs: undefined } }, base).pageDelay).toEqual({
      minMs: 1000,
      maxMs: 3000
    });
    expect(resolveDriverConfig({ pageDelay: { minMs: 0 } }, base).pageDelay).toEqual({ minMs: 0, maxMs: 3000 });
  });

  it.each([
    { input: { maxRetries: -1 }, message: "maxRetries=-1 is out of allowed range [0..10]" },
    { input: { maxPagesPerPartition: 0 }, message: "maxPagesPerPartition=0 is out of allowed range [1..100000]" },
    { input: { pageDelay: { minMs: 61000 } }, message: "pageDelay.minMs=61000 is out of allowed range [0..60000]" },
    { input: { pageDelay: { minMs: 2000 } }, message: "pageDelay.minMs=2000 must not exceed pageDelay.maxMs=1000" }
  ])("rejects invalid config: $message", ({ input, message }) => {
    expect(() => resolveDriverConfig(input)).toThrow(message);
  });
});
