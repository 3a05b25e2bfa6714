import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import {
  clearLogSummary,
  configureLogging,
  getLogSummary,
  info,
  isDebugEnabled,
  warn,
} from "../../utils/logger";

describe("logger", () => {
  const initial = isDebugEnabled();

  beforeEach(() => {
    clearLogSummary();
  });

  afterEach(() => {
    configureLogging({ console: initial });
    vi.restoreAllMocks();
  });

  it("records entries and per-level counters", () => {
    info("mapper.test", { a: 1 });
    warn("mapper.test");
    const summary = getLogSummary();
    expect(summary.logs.map((e) => [e.level, e.event, e.meta])).toEqual([
      ["info", "mapper.test", { a: 1 }],
      ["warn", "mapper.test", {}],
    ]);
    expect(summary.counters).toEqual({ "log.info": 1, "log.warn": 1 });
  });

  it("mirrors info to the console only when enabled", () => {
    const spy = vi.spyOn(console, "info").mockImplementation(() => undefined);
    configureLogging({ console: false });
    info("quiet");
    expect(spy).not.toHaveBeenCalled();

    configureLogging({ console: true });
    expect(isDebugEnabled()).toBe(true);
    info("loud", { n: 2 });
    expect(spy).toHaveBeenCalledWith("[RDF_MAPPER]", "loud", { n: 2 });
  });

  it("always sends warnings to the console", () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    configureLogging({ console: false });
    warn("heads-up");
    expect(spy).toHaveBeenCalledTimes(1);
  });
});
