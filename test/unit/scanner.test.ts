import assert from "node:assert/strict";
import { mkdir } from "node:fs/promises";
import path from "node:path";
import { test } from "node:test";

import {
  isJpegFileName,
  scanDirectory,
  toDisplayName,
} from "../../src/gallery/scanner.js";
import { GalleryScanError } from "../../src/lib/errors.js";
import { createGalleryDir, silentLogger } from "../helpers/fixtures.js";

test("isJpegFileName matches jpg and jpeg in any case", () => {
  assert.equal(isJpegFileName("a.jpg"), true);
  assert.equal(isJpegFileName("b.jpeg"), true);
  assert.equal(isJpegFileName("C.JPG"), true);
  assert.equal(isJpegFileName("d.JpEg"), true);
  assert.equal(isJpegFileName("e.png"), false);
  assert.equal(isJpegFileName("jpg"), false);
  assert.equal(isJpegFileName("notes.jpg.txt"), false);
});

test("toDisplayName strips the extension only", () => {
  assert.equal(toDisplayName("sunset.jpg"), "sunset");
  assert.equal(toDisplayName("city.night.JPEG"), "city.night");
});

test("scanDirectory keeps the lister's order and assigns ordinals", async () => {
  const scan = await scanDirectory("/gallery", {
    logger: silentLogger(),
    listDirectory: async () => ["z.jpg", "readme.md", "a.JPEG", "m.jpg"],
    isFile: async () => true,
  });

  assert.equal(scan.count, 3);
  assert.deepEqual(
    scan.images.map((image) => [image.ordinal, image.fileName]),
    [
      [0, "z.jpg"],
      [1, "a.JPEG"],
      [2, "m.jpg"],
    ],
  );
  assert.equal(scan.images[1].path, path.join("/gallery", "a.JPEG"));
  assert.equal(scan.images[1].displayName, "a");
  assert.deepEqual(scan.skipped, []);
});

test("scanDirectory skips entries it cannot stat", async () => {
  const scan = await scanDirectory("/gallery", {
    logger: silentLogger(),
    listDirectory: async () => ["a.jpg", "broken.jpg", "c.jpg"],
    isFile: async (filePath) => {
      if (filePath.endsWith("broken.jpg")) {
        throw new Error("EACCES: permission denied");
      }
      return true;
    },
  });

  assert.deepEqual(
    scan.images.map((image) => [image.ordinal, image.fileName]),
    [
      [0, "a.jpg"],
      [1, "c.jpg"],
    ],
  );
  assert.deepEqual(scan.skipped, [
    { fileName: "broken.jpg", reason: "EACCES: permission denied" },
  ]);
});

test("scanDirectory reads a real directory and ignores subdirectories", async () => {
  const fixture = await createGalleryDir({
    "a.jpg": "x",
    "b.jpeg": "x",
    "c.txt": "x",
    "D.JPG": "x",
  });
  try {
    await mkdir(path.join(fixture.directory, "nested.jpg"));

    const scan = await scanDirectory(fixture.directory, {
      logger: silentLogger(),
    });

    assert.equal(scan.count, 3);
    assert.deepEqual(
      scan.images.map((image) => image.fileName).sort(),
      ["D.JPG", "a.jpg", "b.jpeg"],
    );
    assert.deepEqual(
      scan.images.map((image) => image.ordinal),
      [0, 1, 2],
    );
  } finally {
    await fixture.cleanup();
  }
});

test("scanDirectory fails when the directory cannot be listed", async () => {
  const missing = path.join("/nonexistent", "gallery-root");
  await assert.rejects(
    scanDirectory(missing, { logger: silentLogger() }),
    (error: unknown) => {
      assert.ok(error instanceof GalleryScanError);
      assert.equal(error.directory, missing);
      return true;
    },
  );
});
