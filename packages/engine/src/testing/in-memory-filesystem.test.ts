import { describe, expect, it } from "vitest";
import { decodeToString, fromString } from "../utils/buffer.js";
import { InMemoryFileSystem } from "./in-memory-filesystem.js";

describe("InMemoryFileSystem", () => {
  it("round-trips file contents", async () => {
    const fs = new InMemoryFileSystem();
    await fs.mkdir("/srv/data");

    await fs.writeFile("/srv/data/a.txt", fromString("hello"));

    expect(decodeToString(await fs.readFile("/srv/data/a.txt"))).toBe("hello");
  });

  it("normalizes dot segments and duplicate slashes", async () => {
    const fs = new InMemoryFileSystem();
    await fs.mkdir("/srv");

    await fs.writeFile("/srv//./b.txt", fromString("b"));

    expect(decodeToString(await fs.readFile("/srv/b.txt"))).toBe("b");
  });

  it("replaces an existing file", async () => {
    const fs = new InMemoryFileSystem();
    await fs.writeFile("/c.txt", fromString("first version"));
    await fs.writeFile("/c.txt", fromString("2nd"));

    expect(decodeToString(await fs.readFile("/c.txt"))).toBe("2nd");
  });

  it("rejects writes into a missing directory", async () => {
    const fs = new InMemoryFileSystem();
    await expect(fs.writeFile("/nope/d.txt", fromString("x"))).rejects.toThrow(
      "ENOENT",
    );
  });

  it("rejects reading missing files and directories", async () => {
    const fs = new InMemoryFileSystem();
    await fs.mkdir("/dir");

    await expect(fs.readFile("/missing.txt")).rejects.toThrow("ENOENT");
    await expect(fs.readFile("/dir")).rejects.toThrow("EISDIR");
  });

  it("returns copies so callers cannot mutate stored data", async () => {
    const fs = new InMemoryFileSystem();
    const data = fromString("abc");
    await fs.writeFile("/e.txt", data);
    data[0] = 0x7a;

    const read = await fs.readFile("/e.txt");
    read[1] = 0x7a;

    expect(decodeToString(await fs.readFile("/e.txt"))).toBe("abc");
  });
});
