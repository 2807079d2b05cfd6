/**
 * @file Tests for the stream handle: lifecycle, dispatch and typed helpers
 */
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join as joinPath } from "node:path";
import type { IoBuffer } from "./buffer";
import { StreamOpenError } from "./errors";
import { createGzipStream, createPlainStream, createStreamHandle, openStream, withStream } from "./handle";
import { IO_ERROR, type CloseResult, type OpenOutcome, type StreamBackend } from "./types";

type FakeResource = { id: number; buffer: IoBuffer };

type FakeBackend = StreamBackend<"plain", FakeResource> & {
  opened: number[];
  closed: number[];
  failOpen: boolean;
  failClose: boolean;
};

function createFakeBackend(): FakeBackend {
  // eslint-disable-next-line no-restricted-syntax -- resource id counter
  let next = 0;
  const fake: FakeBackend = {
    kind: "plain",
    opened: [],
    closed: [],
    failOpen: false,
    failClose: false,
    open(_path: string, _mode: string, buffer: IoBuffer): OpenOutcome<FakeResource> {
      if (fake.failOpen) {
        return { ok: false, cause: new Error("no such file") };
      }
      next += 1;
      fake.opened.push(next);
      return { ok: true, resource: { id: next, buffer } };
    },
    close(r: FakeResource): CloseResult {
      fake.closed.push(r.id);
      return fake.failClose ? { ok: false, cause: new Error("disk full") } : { ok: true };
    },
    read: (_r, _dst, n) => n,
    bulkRead: (_r, _dst, n) => n,
    write: (_r, _src, n) => n,
    getc: () => 0,
    seek: (_r, offset) => ({ ok: true, position: offset }),
    tell: () => 0,
    eof: () => false,
    seekable: () => true,
    rebuffer: () => true,
  };
  return fake;
}

describe("stream/handle", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("lifecycle", () => {
    it("closes exactly once when the scope ends normally", () => {
      const backend = createFakeBackend();
      const h = createStreamHandle(backend);
      h.open("a");
      const result = withStream(h, (s) => s.write(new Uint8Array(3)));
      expect(result).toBe(3);
      expect(backend.closed).toEqual([1]);
      expect(h.isOpen()).toBe(false);
    });

    it("closes exactly once when the scope throws", () => {
      const backend = createFakeBackend();
      const h = createStreamHandle(backend);
      h.open("a");
      expect(() =>
        withStream(h, () => {
          throw new Error("boom");
        }),
      ).toThrow("boom");
      expect(backend.closed).toEqual([1]);
    });

    it("closes the previous resource when reopened", () => {
      const backend = createFakeBackend();
      const h = createStreamHandle(backend);
      h.open("a");
      h.open("b", "wb");
      expect(backend.opened).toEqual([1, 2]);
      expect(backend.closed).toEqual([1]);
      expect(h.path).toBe("b");
      h.close();
      expect(backend.closed).toEqual([1, 2]);
    });

    it("treats a second close as a no-op", () => {
      const backend = createFakeBackend();
      const h = createStreamHandle(backend);
      h.open("a");
      expect(h.close()).toBe(true);
      expect(h.close()).toBe(true);
      expect(backend.closed).toEqual([1]);
    });

    it("closes once through Symbol.dispose", () => {
      const backend = createFakeBackend();
      const h = createStreamHandle(backend);
      h.open("a");
      h[Symbol.dispose]();
      h[Symbol.dispose]();
      expect(backend.closed).toEqual([1]);
      expect(h.isOpen()).toBe(false);
    });

    it("throws StreamOpenError carrying path, mode and kind", () => {
      const backend = createFakeBackend();
      backend.failOpen = true;
      const h = createStreamHandle(backend);
      try {
        h.open("/nowhere", "rb");
        expect.unreachable("open should throw");
      } catch (e) {
        expect(e).toBeInstanceOf(StreamOpenError);
        if (e instanceof StreamOpenError) {
          expect(e.path).toBe("/nowhere");
          expect(e.mode).toBe("rb");
          expect(e.kind).toBe("plain");
          expect(e.message).toBe("Could not open file at /nowhere with mode rb (no such file)");
        }
      }
      expect(h.isOpen()).toBe(false);
    });

    it("warns and returns false when closing fails", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const backend = createFakeBackend();
      backend.failClose = true;
      const h = createStreamHandle(backend);
      h.open("data.bin");
      expect(h.close()).toBe(false);
      expect(warn).toHaveBeenCalledWith("Warning: error closing data.bin: disk full");
      expect(h.isOpen()).toBe(false);
    });

    it("prints open and close lines when verbose", () => {
      const err = vi.spyOn(console, "error").mockImplementation(() => {});
      const h = createStreamHandle(createFakeBackend(), { verbose: true });
      h.open("v.bin", "wb");
      h.close();
      expect(err.mock.calls).toEqual([["Opened file at path v.bin with mode 'wb'"], ["Closed file at v.bin"]]);
    });
  });

  describe("closed handle", () => {
    it("returns sentinels instead of touching a backend", () => {
      const h = createStreamHandle(createFakeBackend());
      const buf = new Uint8Array(4);
      expect(h.read(buf)).toBe(IO_ERROR);
      expect(h.bulkRead(buf)).toBe(IO_ERROR);
      expect(h.write(buf)).toBe(IO_ERROR);
      expect(h.getc()).toBe(IO_ERROR);
      expect(h.tell()).toBe(IO_ERROR);
      expect(h.seek(0)).toEqual({ ok: false, reason: "stream is closed" });
      expect(h.eof()).toBe(false);
      expect(h.seekable()).toBe(false);
      expect(h.readValue("u8")).toBeUndefined();
      expect(h.path).toBe("");
    });

    it("resizes its own buffer while closed", () => {
      const h = createStreamHandle(createFakeBackend(), { bufferSize: 16 });
      expect(h.bufferSize).toBe(16);
      expect(h.resizeBuffer(64)).toBe(true);
      expect(h.bufferSize).toBe(64);
      expect(h.resizeBuffer(0)).toBe(false);
      expect(h.resizeBuffer(1.5)).toBe(false);
      expect(h.bufferSize).toBe(64);
    });

    it("passes the resized buffer to the next open", () => {
      const backend = createFakeBackend();
      const seen: number[] = [];
      const open = backend.open;
      backend.open = (path, mode, buffer) => {
        seen.push(buffer.size);
        return open(path, mode, buffer);
      };
      const h = createStreamHandle(backend, { bufferSize: 16 });
      h.resizeBuffer(32);
      h.open("x");
      expect(seen).toEqual([32]);
      h.close();
    });
  });

  describe("typed helpers on a real file", () => {
    let dir = "";
    beforeEach(() => {
      dir = mkdtempSync(joinPath(tmpdir(), "streamwrap-handle-"));
    });
    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    for (const kind of ["plain", "compressed"] as const) {
      it(`round-trips raw values and text (${kind})`, () => {
        const p = joinPath(dir, `values.${kind}`);
        withStream(openStream(kind, p, "wb"), (w) => {
          expect(w.writeRawBytes("u32", 0xdeadbeef)).toBe(4);
          expect(w.writeRawBytes("i64", -5n)).toBe(8);
          expect(w.writeText("hi")).toBe(2);
          expect(w.printf("%d-%s", 7, "x")).toBe(3);
        });
        withStream(openStream(kind, p), (r) => {
          expect(r.readValue("u32")).toBe(0xdeadbeef);
          expect(r.readBigValue("i64")).toBe(-5n);
          const rest = new Uint8Array(5);
          expect(r.read(rest)).toBe(5);
          expect(new TextDecoder().decode(rest)).toBe("hi7-x");
          expect(r.readValue("u8")).toBeUndefined();
        });
      });
    }

    it("picks the backend from the kind tag", () => {
      const p = joinPath(dir, "k.bin");
      const plain = openStream("plain", p, "wb");
      expect(plain.kind).toBe("plain");
      expect(plain.isCompressed).toBe(false);
      plain.close();
      const gz = openStream("compressed", p, "wb");
      expect(gz.kind).toBe("compressed");
      expect(gz.isCompressed).toBe(true);
      gz.close();
    });

    it("creates closed handles when no path is given", () => {
      expect(createPlainStream().isOpen()).toBe(false);
      expect(createGzipStream().isOpen()).toBe(false);
    });

    it("throws StreamOpenError for a missing path", () => {
      const p = joinPath(dir, "missing", "file");
      expect(() => createPlainStream(p, "rb")).toThrow(StreamOpenError);
      expect(() => createGzipStream(p, "rb")).toThrow(`Could not open file at ${p} with mode rb`);
    });
  });
});
