/**
 * Unit tests for DocumentStore
 */

import assert from "node:assert/strict";
import { after, before, test } from "node:test";
import type { PGliteClient } from "../../../src/db/client.ts";
import { DocumentStore } from "../../../src/db/store.ts";
import { DatabaseError, InvalidArgumentError } from "../../../src/errors/error-types.ts";
import { createTestDb } from "../../fixtures/test-db.ts";
import { axis } from "../../fixtures/vectors.ts";

let db: PGliteClient;
let store: DocumentStore;

before(async () => {
  db = await createTestDb();
  store = new DocumentStore(db);
});

after(async () => {
  await db.close();
});

test("DocumentStore - inserts documents and chunks", async () => {
  const doc = await store.insertDocument("Field Guide", "Birds.\nTrees.");
  const chunk = await store.insertChunk(doc.id, 0, "Birds.");

  assert.equal(doc.name, "Field Guide");
  assert.equal(doc.content, "Birds.\nTrees.");
  assert.equal(chunk.documentId, doc.id);
  assert.equal(chunk.index, 0);
  assert.equal(chunk.content, "Birds.");

  const found = await store.findDocumentsByName("Field Guide");
  assert.deepEqual(found.map((d) => d.id), [doc.id]);
});

test("DocumentStore - chunk index is unique per document", async () => {
  const doc = await store.insertDocument("Duplicate Chunks", "x");
  await store.insertChunk(doc.id, 0, "first");

  await assert.rejects(store.insertChunk(doc.id, 0, "again"), DatabaseError);
  await assert.rejects(store.insertChunk(doc.id, -1, "negative"), InvalidArgumentError);
});

test("DocumentStore - upsertEmbedding replaces the (chunk, model, task) vector", async () => {
  const doc = await store.insertDocument("Upserts", "x");
  const chunk = await store.insertChunk(doc.id, 0, "x");

  await store.upsertEmbedding(chunk.id, "upsert-model", "semantic", axis(0));
  await store.upsertEmbedding(chunk.id, "upsert-model", "semantic", axis(1));
  await store.upsertEmbedding(chunk.id, "upsert-model", "qa", axis(2));

  const counts = await store.countEmbeddings();
  assert.deepEqual(
    counts.filter((c) => c.model === "upsert-model"),
    [
      { model: "upsert-model", task: "qa", count: 1 },
      { model: "upsert-model", task: "semantic", count: 1 },
    ],
  );

  const row = await db.queryOne(
    "SELECT (embedding <-> $1::vector) AS d FROM embeddings WHERE chunk_id = $2 AND task = 'semantic'",
    [`[${axis(1).join(",")}]`, chunk.id],
  );
  assert.equal(row?.d, 0);
});

test("DocumentStore - rejects vectors of the wrong size", async () => {
  const doc = await store.insertDocument("Wrong Size", "x");
  const chunk = await store.insertChunk(doc.id, 0, "x");

  await assert.rejects(store.upsertEmbedding(chunk.id, "m", "t", [1, 2, 3]), {
    message: "Embedding must have 768 dimensions, got 3",
  });
});

test("DocumentStore - deleting a document cascades to chunks and embeddings", async () => {
  const doc = await store.insertDocument("Cascade", "a\nb");
  const first = await store.insertChunk(doc.id, 0, "a");
  const second = await store.insertChunk(doc.id, 1, "b");
  await store.upsertEmbedding(first.id, "cascade-model", "semantic", axis(0));
  await store.upsertEmbedding(second.id, "cascade-model", "semantic", axis(1));
  const initial = await store.countRows();

  assert.equal(await store.deleteDocument(doc.id), true);
  assert.equal(await store.deleteDocument(doc.id), false);

  const afterDelete = await store.countRows();
  assert.deepEqual(afterDelete, {
    documents: initial.documents - 1,
    chunks: initial.chunks - 2,
    embeddings: initial.embeddings - 2,
  });

  const orphanChunks = await db.query("SELECT id FROM document_chunks WHERE document_id = $1", [doc.id]);
  const orphanEmbeddings = await db.query(
    "SELECT chunk_id FROM embeddings WHERE chunk_id = $1 OR chunk_id = $2",
    [first.id, second.id],
  );
  assert.equal(orphanChunks.length, 0);
  assert.equal(orphanEmbeddings.length, 0);
});
