import {
  hasImageTarget,
  hasTextTarget,
  parseTargets,
  selectTextTarget,
} from "../../../packages/core/clipboard/targets";

describe("clipboard targets", () => {
  it("parses one target per line", () => {
    expect(parseTargets("TARGETS\nUTF8_STRING\r\n\n  STRING \n")).toEqual(["TARGETS", "UTF8_STRING", "STRING"]);
  });

  it("detects image targets", () => {
    expect(hasImageTarget(["TARGETS", "image/png"])).toBe(true);
    expect(hasImageTarget(["TARGETS", "image/jpeg"])).toBe(true);
    expect(hasImageTarget(["TARGETS", "image/gif"])).toBe(false);
  });

  it("requires an exact target name", () => {
    expect(hasTextTarget(["text/plain;charset=utf-8"])).toBe(false);
    expect(hasTextTarget(["STRING"])).toBe(true);
  });

  it("picks text targets in priority order", () => {
    expect(selectTextTarget(["STRING", "text/plain", "UTF8_STRING"])).toBe("UTF8_STRING");
    expect(selectTextTarget(["STRING", "text/uri-list"])).toBe("text/uri-list");
    expect(selectTextTarget(["STRING"])).toBe("STRING");
    expect(selectTextTarget(["image/png"])).toBeUndefined();
  });
});
