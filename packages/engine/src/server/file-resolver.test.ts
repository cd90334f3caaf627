import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { NodeFileSystem } from "../adapters/node/node-filesystem.js";
import { ConfigError } from "../config/server-config.js";
import { FileSystemError } from "../interfaces/filesystem.js";
import { InMemoryFileSystem } from "../testing/in-memory-filesystem.js";
import { decodeToString } from "../utils/buffer.js";
import { FileResolveError, FileResolver } from "./file-resolver.js";

function createSite(): InMemoryFileSystem {
  const memfs = new InMemoryFileSystem();
  memfs.writeFile("/srv/www/index.html", "<h1>home</h1>");
  memfs.writeFile("/srv/www/css/site.css", "body {}");
  memfs.writeFile("/srv/www/docs/index.html", "<h1>docs</h1>");
  memfs.writeFile("/srv/www/README", "plain");
  memfs.writeFile("/srv/www/locked.txt", "locked");
  memfs.setReadable("/srv/www/locked.txt", false);
  memfs.writeFile("/srv/secret.txt", "top secret");
  memfs.symlink("/srv/secret.txt", "/srv/www/escape.txt");
  memfs.symlink("../../secret.txt", "/srv/www/css/relative-escape.txt");
  memfs.symlink("css/site.css", "/srv/www/alias.txt");
  memfs.symlink("/srv/www", "/srv/current");
  return memfs;
}

describe("FileResolver (in-memory filesystem)", () => {
  it("resolves a file with its content and MIME type", async () => {
    const resolver = new FileResolver({ root: "/srv/www", fs: createSite() });

    const file = await resolver.resolve("/index.html");

    expect(file.absolutePath).toBe("/srv/www/index.html");
    expect(decodeToString(file.content)).toBe("<h1>home</h1>");
    expect(file.mime).toBe("text/html");
  });

  it("resolves nested files", async () => {
    const resolver = new FileResolver({ root: "/srv/www", fs: createSite() });

    const file = await resolver.resolve("/css/site.css");

    expect(file.mime).toBe("text/css");
    expect(decodeToString(file.content)).toBe("body {}");
  });

  it("falls back to octet-stream without an extension", async () => {
    const resolver = new FileResolver({ root: "/srv/www", fs: createSite() });
    expect((await resolver.resolve("/README")).mime).toBe(
      "application/octet-stream",
    );
  });

  it("follows symlinks that stay inside the root, typed by the requested name", async () => {
    const resolver = new FileResolver({ root: "/srv/www", fs: createSite() });

    const file = await resolver.resolve("/alias.txt");

    expect(file.absolutePath).toBe("/srv/www/css/site.css");
    expect(file.mime).toBe("text/plain");
    expect(decodeToString(file.content)).toBe("body {}");
  });

  it("works when the root itself is a symlink", async () => {
    const resolver = new FileResolver({
      root: "/srv/current",
      fs: createSite(),
    });

    const file = await resolver.resolve("/css/site.css");

    expect(file.absolutePath).toBe("/srv/www/css/site.css");
  });

  it("reports missing files as NOT_FOUND", async () => {
    const resolver = new FileResolver({ root: "/srv/www", fs: createSite() });

    await expect(resolver.resolve("/missing.html")).rejects.toMatchObject({
      code: "NOT_FOUND",
    });
    await expect(resolver.resolve("/index.html/child")).rejects.toMatchObject(
      { code: "NOT_FOUND" },
    );
  });

  it("reports directories as NOT_FOUND without an index file", async () => {
    const resolver = new FileResolver({ root: "/srv/www", fs: createSite() });

    await expect(resolver.resolve("/")).rejects.toMatchObject({
      code: "NOT_FOUND",
    });
    await expect(resolver.resolve("/docs")).rejects.toMatchObject({
      code: "NOT_FOUND",
    });
  });

  it("serves the index file for directories when configured", async () => {
    const resolver = new FileResolver({
      root: "/srv/www",
      fs: createSite(),
      indexFile: "index.html",
    });

    const root = await resolver.resolve("/");
    expect(root.absolutePath).toBe("/srv/www/index.html");
    expect(root.mime).toBe("text/html");

    const docs = await resolver.resolve("/docs");
    expect(decodeToString(docs.content)).toBe("<h1>docs</h1>");

    await expect(resolver.resolve("/css")).rejects.toMatchObject({
      code: "NOT_FOUND",
    });
  });

  it("forbids paths that leave the root", async () => {
    const resolver = new FileResolver({ root: "/srv/www", fs: createSite() });

    await expect(resolver.resolve("/../secret.txt")).rejects.toThrow(
      new FileResolveError("FORBIDDEN", "Path is outside the document root"),
    );
  });

  it.each(["/escape.txt", "/css/relative-escape.txt"])(
    "forbids the symlink escape %s",
    async (requestPath) => {
      const resolver = new FileResolver({
        root: "/srv/www",
        fs: createSite(),
      });

      await expect(resolver.resolve(requestPath)).rejects.toThrow(
        "Path resolves outside the document root",
      );
      await expect(resolver.resolve(requestPath)).rejects.toBeInstanceOf(
        FileResolveError,
      );
    },
  );

  it("forbids files it may not read", async () => {
    const resolver = new FileResolver({ root: "/srv/www", fs: createSite() });

    await expect(resolver.resolve("/locked.txt")).rejects.toMatchObject({
      code: "FORBIDDEN",
      message: "Permission denied",
    });
  });

  it("propagates unexpected filesystem errors", async () => {
    class FailingFileSystem extends InMemoryFileSystem {
      override async readFile(): Promise<Uint8Array> {
        throw new FileSystemError("EIO", "disk on fire");
      }
    }
    const memfs = new FailingFileSystem();
    memfs.writeFile("/srv/www/page.html", "x");
    const resolver = new FileResolver({ root: "/srv/www", fs: memfs });

    await expect(resolver.resolve("/page.html")).rejects.toBeInstanceOf(
      FileSystemError,
    );
  });

  describe("verifyRoot", () => {
    it("accepts an existing directory", async () => {
      const resolver = new FileResolver({ root: "/srv/www", fs: createSite() });
      await expect(resolver.verifyRoot()).resolves.toBeUndefined();
    });

    it("rejects a missing root", async () => {
      const resolver = new FileResolver({
        root: "/srv/missing",
        fs: createSite(),
      });
      await expect(resolver.verifyRoot()).rejects.toThrow(
        new ConfigError("Document root /srv/missing is not accessible (ENOENT)"),
      );
    });

    it("rejects a root that is a file", async () => {
      const resolver = new FileResolver({
        root: "/srv/secret.txt",
        fs: createSite(),
      });
      await expect(resolver.verifyRoot()).rejects.toThrow(
        "Document root /srv/secret.txt is not a directory",
      );
    });
  });
});

describe("FileResolver (node filesystem)", () => {
  let tmpDir: string;
  let root: string;
  let symlinksSupported = true;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "tinyserve-resolver-"));
    root = path.join(tmpDir, "www");
    await fs.mkdir(path.join(root, "img"), { recursive: true });
    await fs.writeFile(path.join(root, "hello.txt"), "hello");
    await fs.writeFile(
      path.join(root, "img", "pixel.png"),
      new Uint8Array([0x89, 0x50, 0x4e, 0x47]),
    );
    await fs.writeFile(path.join(tmpDir, "outside.txt"), "outside");
    try {
      await fs.symlink(
        path.join(tmpDir, "outside.txt"),
        path.join(root, "leak.txt"),
      );
    } catch {
      symlinksSupported = false;
    }
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("reads files from disk", async () => {
    const resolver = new FileResolver({ root, fs: new NodeFileSystem() });

    const text = await resolver.resolve("/hello.txt");
    expect(decodeToString(text.content)).toBe("hello");
    expect(text.absolutePath).toBe(
      await fs.realpath(path.join(root, "hello.txt")),
    );

    const image = await resolver.resolve("/img/pixel.png");
    expect(image.mime).toBe("image/png");
    expect([...image.content]).toEqual([0x89, 0x50, 0x4e, 0x47]);
  });

  it("maps missing files to NOT_FOUND", async () => {
    const resolver = new FileResolver({ root, fs: new NodeFileSystem() });
    await expect(resolver.resolve("/nope.txt")).rejects.toMatchObject({
      code: "NOT_FOUND",
    });
  });

  it("refuses a symlink pointing outside the root", async () => {
    if (!symlinksSupported) return;
    const resolver = new FileResolver({ root, fs: new NodeFileSystem() });

    await expect(resolver.resolve("/leak.txt")).rejects.toMatchObject({
      code: "FORBIDDEN",
    });
  });
});
