import { createLogger, getLogLevel, isLogLevel, setLogLevel } from "../../packages/core/logger";

describe("logger", () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    jest.restoreAllMocks();
  });

  it("prefixes lines with the scope", () => {
    const spy = jest.spyOn(console, "info").mockImplementation(() => undefined);
    setLogLevel("info");
    createLogger("monitor").info("started", 3);
    expect(spy).toHaveBeenCalledWith("[monitor]", "started", 3);
  });

  it("drops lines below the current level", () => {
    const debug = jest.spyOn(console, "debug").mockImplementation(() => undefined);
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    setLogLevel("warn");
    const log = createLogger("hub");
    log.debug("hidden");
    log.warn("shown");
    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[hub]", "shown");
  });

  it("recognises only real levels", () => {
    expect(isLogLevel("error")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel("constructor")).toBe(false);
  });
});
