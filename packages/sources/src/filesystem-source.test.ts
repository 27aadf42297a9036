import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SourceNotFoundError, SourceUnreachableError } from "@ingestkit/errors";
import { FilesystemSource, resolveLocalPath } from "./filesystem-source.js";

describe("FilesystemSource", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "fs-source-test-"));
    await mkdir(join(root, "nested"));
    await mkdir(join(root, ".git"));
    await writeFile(join(root, "b.md"), "# B");
    await writeFile(join(root, "a.txt"), "alpha");
    await writeFile(join(root, "nested", "c.html"), "<p>c</p>");
    await writeFile(join(root, "image.png"), "not text");
    await writeFile(join(root, ".git", "notes.txt"), "internal");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("scans supported files recursively in sorted order", async () => {
    const docs = await new FilesystemSource().fetch(root);

    expect(docs.map((d) => d.id)).toEqual(["a.txt", "b.md", "nested/c.html"]);
  });

  it("records provenance metadata", async () => {
    const docs = await new FilesystemSource().fetch(`file://${root}`);

    expect(docs[0]).toEqual({
      id: "a.txt",
      text: "alpha",
      metadata: { source: join(root, "a.txt"), filename: "a.txt", extension: ".txt", size: 5 },
    });
  });

  it("reads a single file root as one document", async () => {
    const docs = await new FilesystemSource().fetch(join(root, "nested", "c.html"));

    expect(docs).toHaveLength(1);
    expect(docs[0]?.id).toBe("c.html");
    expect(docs[0]?.metadata["extension"]).toBe(".html");
  });

  it("raises SourceNotFoundError for a missing path", async () => {
    await expect(new FilesystemSource().fetch(join(root, "missing"))).rejects.toBeInstanceOf(
      SourceNotFoundError,
    );
  });

  it("skips a subdirectory it cannot list and keeps the rest", async () => {
    const denied = join(root, "nested");
    const source = new FilesystemSource({
      readDirectory: async (dir) => {
        if (dir === denied) {
          throw Object.assign(new Error(`EACCES: permission denied, scandir '${dir}'`), {
            code: "EACCES",
          });
        }
        return readdir(dir, { withFileTypes: true });
      },
    });

    const docs = await source.fetch(root);

    expect(docs.map((d) => d.id)).toEqual(["a.txt", "b.md"]);
  });

  it("fails when the root itself cannot be listed", async () => {
    const source = new FilesystemSource({
      readDirectory: async (dir) => {
        throw Object.assign(new Error(`EACCES: permission denied, scandir '${dir}'`), {
          code: "EACCES",
        });
      },
    });

    await expect(source.fetch(root)).rejects.toBeInstanceOf(SourceUnreachableError);
  });
});

describe("resolveLocalPath", () => {
  it("maps pvc claims onto the mount path", () => {
    expect(resolveLocalPath("pvc://docs-claim/data/handbook")).toBe("/data/handbook");
  });

  it("handles file URLs, local URIs and bare paths", () => {
    expect(resolveLocalPath("file:///srv/docs")).toBe("/srv/docs");
    expect(resolveLocalPath("local://srv/docs")).toBe("/srv/docs");
    expect(resolveLocalPath("/srv/docs")).toBe("/srv/docs");
  });
});
