import assert from "node:assert/strict";
import { test } from "node:test";

import { unzipSync } from "fflate";

import { ArchiveBuilder } from "../../src/gallery/archive.js";
import { InvariantError } from "../../src/lib/errors.js";

test("ArchiveBuilder writes a zip readable entry by entry", () => {
  const archive = new ArchiveBuilder();
  const first = Buffer.from([0xff, 0xd8, 0xff, 0x00, 0x01, 0x02]);
  const second = Buffer.from("second original");

  archive.append("a.jpg", first);
  archive.append("b.jpeg", second);
  assert.equal(archive.entryCount, 2);

  const zipped = archive.finalize();
  assert.equal(zipped.readUInt32LE(0), 0x04034b50);

  const entries = unzipSync(zipped);
  assert.deepEqual(Object.keys(entries), ["a.jpg", "b.jpeg"]);
  assert.ok(Buffer.from(entries["a.jpg"]).equals(first));
  assert.ok(Buffer.from(entries["b.jpeg"]).equals(second));
});

test("ArchiveBuilder keeps non-ASCII entry names", () => {
  const archive = new ArchiveBuilder();
  archive.append("café.jpg", Buffer.from("bytes"));

  const entries = unzipSync(archive.finalize());
  assert.deepEqual(Object.keys(entries), ["café.jpg"]);
});

test("ArchiveBuilder finalizes an empty archive", () => {
  const archive = new ArchiveBuilder();
  const zipped = archive.finalize();

  assert.deepEqual(unzipSync(zipped), {});
});

test("ArchiveBuilder rejects duplicate entry names", () => {
  const archive = new ArchiveBuilder();
  archive.append("a.jpg", Buffer.from("one"));

  assert.throws(
    () => archive.append("a.jpg", Buffer.from("two")),
    (error: unknown) =>
      error instanceof InvariantError &&
      error.message === 'duplicate archive entry: "a.jpg"',
  );
  assert.equal(archive.entryCount, 1);
});

test("ArchiveBuilder cannot be finalized twice or appended to afterwards", () => {
  const archive = new ArchiveBuilder();
  archive.append("a.jpg", Buffer.from("one"));
  archive.finalize();

  assert.throws(() => archive.finalize(), InvariantError);
  assert.throws(
    () => archive.append("b.jpg", Buffer.from("two")),
    InvariantError,
  );
});
