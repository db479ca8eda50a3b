import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { pathToFileURL } from "node:url";
import {
  TIMEOUT_IMAGE_MS,
  TIMEOUT_TEXT_MS,
  createXclipAdapter,
  decodeBase64,
} from "../../../packages/core/clipboard/adapter";
import { FAKE_ENV, FAKE_XCLIP, createFakeXclip, timeoutFailure } from "../../harness/fakeXclip";

// 1x1 transparent PNG
const PNG_BASE64 =
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==";

describe("xclip adapter", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "lanclip-adapter-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function setup() {
    const xclip = createFakeXclip();
    const resolve = jest.fn(async () => FAKE_ENV);
    const adapter = createXclipAdapter({ runner: xclip.runner, resolve, tmpDir });
    return { xclip, resolve, adapter };
  }

  it("reads back text it wrote", async () => {
    const { adapter } = setup();
    const written = await adapter.write("hello", "text/plain", false);
    expect(written).toEqual({ ok: true, value: undefined });
    expect(await adapter.read()).toEqual({ content: "hello", mimeType: "text/plain", isBinary: false });
  });

  it("reads back a base64 image it wrote", async () => {
    const { adapter, xclip } = setup();
    expect((await adapter.write(PNG_BASE64, "image/png", true)).ok).toBe(true);
    expect(xclip.selection.get("image/png")).toEqual(Buffer.from(PNG_BASE64, "base64"));
    expect(await adapter.read()).toEqual({ content: PNG_BASE64, mimeType: "image/png", isBinary: true });
  });

  it("passes the display context through sudo", async () => {
    const { adapter, xclip } = setup();
    await adapter.write("hi", "text/plain", false);
    const req = xclip.calls[0].request;
    expect(req.command).toBe("sudo");
    expect(req.args.slice(0, 6)).toEqual([
      "-u",
      "deck",
      "env",
      "DISPLAY=:1",
      "XAUTHORITY=/home/deck/.Xauthority",
      FAKE_XCLIP,
    ]);
    expect(req.captureOutput).toBe(false);
    expect(req.timeoutMs).toBe(TIMEOUT_TEXT_MS);
  });

  it("uses the longer timeout for image writes", async () => {
    const { adapter, xclip } = setup();
    await adapter.write(PNG_BASE64, "image/png", true);
    expect(xclip.calls[0].request.timeoutMs).toBe(TIMEOUT_IMAGE_MS);
  });

  it("writes through a world-readable temp file and removes it", async () => {
    const { adapter, xclip } = setup();
    await adapter.write("payload", "text/plain", false);
    const call = xclip.calls[0];
    expect(call.args).toEqual(["-t", "text/plain", "-i", call.inputPath]);
    expect(call.input?.toString("utf8")).toBe("payload");
    expect(await fs.readdir(tmpDir)).toEqual([]);
  });

  it("removes the temp file when xclip fails", async () => {
    const { adapter, xclip } = setup();
    xclip.failWhen((args) =>
      args.includes("-i")
        ? { kind: "ExternalProcessError", message: "xclip exited with code 1", exitCode: 1, stderr: "Can't open display" }
        : undefined
    );
    const result = await adapter.write("x", "text/plain", false);
    expect(result).toEqual({
      ok: false,
      error: { kind: "ExternalProcessError", message: "xclip exited with code 1", exitCode: 1, stderr: "Can't open display" },
    });
    expect(await fs.readdir(tmpDir)).toEqual([]);
  });

  it("rejects malformed base64 without launching xclip", async () => {
    const { adapter, xclip } = setup();
    const result = await adapter.write("not base64!", "image/png", true);
    expect(result).toEqual({ ok: false, error: { kind: "EncodingError", message: "content is not valid base64" } });
    expect(xclip.calls).toHaveLength(0);
  });

  it("probes targets before reading text with the preferred target", async () => {
    const { adapter, xclip } = setup();
    xclip.selection.set("STRING", Buffer.from("latin"));
    xclip.selection.set("UTF8_STRING", Buffer.from("héllo"));
    const snapshot = await adapter.read();
    expect(snapshot.content).toBe("héllo");
    expect(xclip.calls.map((c) => c.args)).toEqual([
      ["-t", "TARGETS", "-o"],
      ["-t", "UTF8_STRING", "-o"],
    ]);
  });

  it("prefers the image when both image and text are offered", async () => {
    const { adapter, xclip } = setup();
    xclip.selection.set("UTF8_STRING", Buffer.from("caption"));
    xclip.selection.set("image/png", Buffer.from(PNG_BASE64, "base64"));
    const snapshot = await adapter.read();
    expect(snapshot).toEqual({ content: PNG_BASE64, mimeType: "image/png", isBinary: true });
    expect(xclip.calls[1].request.timeoutMs).toBe(TIMEOUT_IMAGE_MS);
  });

  it("falls back to text when the image read returns nothing", async () => {
    const { adapter, xclip } = setup();
    xclip.selection.set("image/jpeg", Buffer.from([0xff, 0xd8]));
    xclip.selection.set("text/plain", Buffer.from("fallback"));
    const snapshot = await adapter.read();
    expect(snapshot).toEqual({ content: "fallback", mimeType: "text/plain", isBinary: false });
    expect(xclip.calls.map((c) => c.args[1])).toEqual(["TARGETS", "image/png", "text/plain"]);
  });

  it("falls back to text when the image read times out", async () => {
    const { adapter, xclip } = setup();
    xclip.selection.set("UTF8_STRING", Buffer.from("caption"));
    xclip.selection.set("image/png", Buffer.from(PNG_BASE64, "base64"));
    xclip.failWhen((args) => (args.includes("image/png") ? timeoutFailure(TIMEOUT_IMAGE_MS) : undefined));
    expect(await adapter.read()).toEqual({ content: "caption", mimeType: "text/plain", isBinary: false });
    expect(xclip.calls.map((c) => c.args)).toEqual([
      ["-t", "TARGETS", "-o"],
      ["-t", "image/png", "-o"],
      ["-t", "UTF8_STRING", "-o"],
    ]);
  });

  it("reports a timeout only when the text read times out as well", async () => {
    const { adapter, xclip } = setup();
    xclip.selection.set("UTF8_STRING", Buffer.from("caption"));
    xclip.selection.set("image/png", Buffer.from(PNG_BASE64, "base64"));
    xclip.failWhen((args) => (args.includes("-o") && !args.includes("TARGETS") ? timeoutFailure(TIMEOUT_TEXT_MS) : undefined));
    expect(await adapter.tryRead()).toEqual({ ok: false, error: timeoutFailure(TIMEOUT_TEXT_MS) });
  });

  it("does an unrestricted read when the targets probe fails", async () => {
    const { adapter, xclip } = setup();
    xclip.copy("UTF8_STRING", "plain");
    xclip.failWhen((args) => (args.includes("TARGETS") ? timeoutFailure(10_000) : undefined));
    expect((await adapter.read()).content).toBe("plain");
    expect(xclip.calls[1].args).toEqual(["-o"]);
  });

  it("returns an empty snapshot for an empty clipboard", async () => {
    const { adapter } = setup();
    expect(await adapter.read()).toEqual({ content: "", mimeType: "text/plain", isBinary: false });
  });

  it("loads images referenced by file URIs", async () => {
    const { adapter, xclip } = setup();
    const file = path.join(tmpDir, "pic.png");
    await fs.writeFile(file, Buffer.from(PNG_BASE64, "base64"));
    xclip.copy("text/uri-list", `${pathToFileURL(file).href}\r\n`);
    expect(await adapter.read()).toEqual({ content: PNG_BASE64, mimeType: "image/png", isBinary: true });
  });

  it("keeps file URIs to non-images as text", async () => {
    const { adapter, xclip } = setup();
    xclip.copy("text/uri-list", "file:///home/deck/readme.md");
    expect(await adapter.read()).toEqual({
      content: "file:///home/deck/readme.md",
      mimeType: "text/plain",
      isBinary: false,
    });
  });

  it("turns a text read timeout into an empty snapshot", async () => {
    const { adapter, xclip } = setup();
    xclip.copy("UTF8_STRING", "slow");
    xclip.failWhen((args) => (args.includes("UTF8_STRING") ? timeoutFailure(TIMEOUT_TEXT_MS) : undefined));
    await expect(adapter.read()).resolves.toEqual({ content: "", mimeType: "text/plain", isBinary: false });
    await expect(adapter.tryRead()).resolves.toEqual({ ok: false, error: timeoutFailure(TIMEOUT_TEXT_MS) });
  });

  it("resolves the environment once", async () => {
    const { adapter, resolve } = setup();
    await Promise.all([adapter.read(), adapter.read(), adapter.isAvailable()]);
    await adapter.write("x", "text/plain", false);
    expect(resolve).toHaveBeenCalledTimes(1);
  });

  it("fails fast without a utility", async () => {
    const xclip = createFakeXclip();
    const adapter = createXclipAdapter({ runner: xclip.runner, resolve: async () => null, tmpDir });
    expect(await adapter.isAvailable()).toBe(false);
    expect(await adapter.read()).toEqual({ content: "", mimeType: "text/plain", isBinary: false });
    expect(await adapter.tryRead()).toEqual({
      ok: false,
      error: { kind: "UtilityUnavailable", message: "Clipboard utility not available" },
    });
    expect((await adapter.write("x", "text/plain", false)).ok).toBe(false);
    expect(xclip.calls).toHaveLength(0);
  });

  it("serializes concurrent writes", async () => {
    const xclip = createFakeXclip();
    let active = 0;
    let maxActive = 0;
    const runner: typeof xclip.runner = async (req) => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise((r) => setTimeout(r, 5));
      const res = await xclip.runner(req);
      active--;
      return res;
    };
    const adapter = createXclipAdapter({ runner, resolve: async () => FAKE_ENV, tmpDir });
    const results = await Promise.all(["a", "b", "c"].map((v) => adapter.write(v, "text/plain", false)));
    expect(results.every((r) => r.ok)).toBe(true);
    expect(maxActive).toBe(1);
    expect(xclip.calls.map((c) => c.input?.toString("utf8"))).toEqual(["a", "b", "c"]);
  });
});

describe("decodeBase64", () => {
  it("accepts padded base64 with line breaks", () => {
    const res = decodeBase64("aGVs\nbG8=");
    expect(res).toEqual({ ok: true, value: Buffer.from("hello") });
  });

  it("rejects bad length", () => {
    expect(decodeBase64("abc").ok).toBe(false);
  });
});
