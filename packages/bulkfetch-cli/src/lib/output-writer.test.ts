import { describe, it, expect } from "vitest";
import { createOutputWriter, toWriteError } from "./output-writer.js";
import { WriteError } from "./errors/types.js";
import { createMemorySink, errnoError, record, text } from "../test-support/fakes.js";

describe("output-writer", () => {
  const shoes = record(2, "Shoes", "123", "https://example.com/a.jpg");
  const bytes = new TextEncoder().encode("JPEGDATA");

  it("writes the bytes under the derived filename", async () => {
    const sink = createMemorySink();
    const writer = createOutputWriter(sink, "/srv/downloads/out");

    const written = await writer.write(shoes, bytes);

    expect(written).toEqual({
      path: "/srv/downloads/out/Shoes-123.jpg",
      filename: "Shoes-123.jpg",
      bytes: 8,
    });
    expect(text(sink.files.get("/srv/downloads/out/Shoes-123.jpg"))).toBe("JPEGDATA");
  });

  it("uses the content type when the URL has no extension", async () => {
    const sink = createMemorySink();
    const writer = createOutputWriter(sink, "/srv/out");

    const written = await writer.write(
      record(3, "Hat", "7", "https://example.com/image?id=7"),
      bytes,
      "image/png"
    );

    expect(written.filename).toBe("Hat-7.png");
  });

  it("creates the output directory once", async () => {
    const sink = createMemorySink();
    const writer = createOutputWriter(sink, "/srv/out");

    await writer.write(shoes, bytes);
    await writer.write(record(3, "Hat", "7", "https://example.com/h.png"), bytes);

    expect(sink.ensureDir).toHaveBeenCalledTimes(1);
    expect(sink.ensureDir).toHaveBeenCalledWith("/srv/out");
  });

  it("reports a directory failure and tries again on the next write", async () => {
    const sink = createMemorySink();
    sink.ensureDir.mockRejectedValueOnce(errnoError("EACCES", "permission denied"));
    const writer = createOutputWriter(sink, "/srv/out");

    await expect(writer.write(shoes, bytes)).rejects.toMatchObject({
      code: "WRITE_DIR_FAILED",
      path: "/srv/out",
    });
    await writer.write(shoes, bytes);

    expect(sink.ensureDir).toHaveBeenCalledTimes(2);
    expect(sink.files.size).toBe(1);
  });

  it.each([
    ["EACCES", "WRITE_PERMISSION_DENIED"],
    ["EPERM", "WRITE_PERMISSION_DENIED"],
    ["ENOSPC", "WRITE_DISK_FULL"],
    ["EISDIR", "WRITE_FAILED"],
  ])("maps %s to %s", async (errno, code) => {
    const sink = createMemorySink();
    sink.writeFile.mockRejectedValueOnce(errnoError(errno));
    const writer = createOutputWriter(sink, "/srv/out");

    await expect(writer.write(shoes, bytes)).rejects.toMatchObject({
      code,
      path: "/srv/out/Shoes-123.jpg",
    });
  });

  it("passes an existing WriteError through", () => {
    const original = new WriteError("WRITE_DISK_FULL", "/x", "full");

    expect(toWriteError("/y", original)).toBe(original);
  });
});
