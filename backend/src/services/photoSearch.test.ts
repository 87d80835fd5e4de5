import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FakeBackend, bagOfWords, writeImage } from "../tests/fakes";
import { AspectIndex, entryIdFor } from "./aspectIndex";
import { EmbeddingProvider } from "./embeddings";
import { InMemoryVectorStore } from "./inMemoryVectorStore";
import { PhotoSearchService } from "./photoSearch";

describe("PhotoSearchService", () => {
  let service: PhotoSearchService;
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "photo-search-test-"));
    service = new PhotoSearchService(
      new AspectIndex(new InMemoryVectorStore({ name: "photos" })),
      new EmbeddingProvider(new FakeBackend(({ prompt }) => `a red car, ${prompt}`)),
      { concurrency: 2 }
    );
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("returns a validation failure when a search has neither image nor text", async () => {
    expect(await service.search({ k: 5 })).toEqual({
      ok: false,
      kind: "validation",
      message: "Provide either a query image or query text",
    });
  });

  it("wraps successful values", async () => {
    await service.upsert("/p/car.png", "default", bagOfWords("a red car"), "a red car");

    const outcome = await service.searchByText("red car");
    expect(outcome.ok).toBe(true);
    if (outcome.ok) expect(outcome.value.map((r) => r.photoPath)).toEqual(["/p/car.png"]);
  });

  it("reports store-level validation as a failure outcome", async () => {
    await service.upsert("/p/car.png", "default", [1, 0], "two dims");
    const outcome = await service.upsert("/p/boat.png", "default", [1, 0, 0], "three dims");
    expect(outcome).toEqual({
      ok: false,
      kind: "validation",
      message: "Embedding has 3 dimensions, the index holds 2",
    });
  });

  it("indexes one photo and exposes its aspects without embeddings", async () => {
    const photo = path.join(root, "car.png");
    await writeImage(photo);

    const added = await service.indexPhoto(photo, "color", "colours?");
    expect(added).toEqual({
      ok: true,
      value: {
        entryId: entryIdFor(photo, "color"),
        photoPath: photo,
        aspectName: "color",
        description: "a red car, colours?",
      },
    });

    expect(await service.getPhotoAspects(photo)).toEqual({
      ok: true,
      value: [
        { entryId: entryIdFor(photo, "color"), photoPath: photo, aspectName: "color", description: "a red car, colours?" },
      ],
    });
  });

  it("keys every path operation by the absolute path", async () => {
    const photo = path.join(root, "car.png");
    await writeImage(photo);
    const relative = path.relative(process.cwd(), photo);

    await service.indexPhoto(relative, "color");
    await service.upsert(relative, "default", bagOfWords("a red car"), "a red car");

    const aspects = await service.getPhotoAspects(relative);
    expect(aspects.ok).toBe(true);
    if (aspects.ok) {
      expect(aspects.value.map((a) => [a.photoPath, a.aspectName])).toEqual([
        [photo, "color"],
        [photo, "default"],
      ]);
    }
    expect(await service.delete(relative, "color")).toEqual({ ok: true, value: 1 });
    expect(await service.delete(relative)).toEqual({ ok: true, value: 1 });
    expect(await service.listPhotoPaths()).toEqual({ ok: true, value: [] });
  });

  it("fails indexing a photo that cannot be read", async () => {
    const outcome = await service.indexPhoto(path.join(root, "missing.png"));
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.kind).toBe("image_read");
  });

  it("runs indexing with the default aspect and concurrency", async () => {
    await writeImage(path.join(root, "one.png"));
    await writeImage(path.join(root, "two.jpg"), { format: "jpeg" });

    const outcome = await service.runIndexing({ directory: root });
    expect(outcome.ok).toBe(true);
    if (outcome.ok) expect(outcome.value).toMatchObject({ aspectName: "default", total: 2, indexed: 2, failed: 0 });
    expect(await service.listPhotoPaths()).toEqual({
      ok: true,
      value: [path.join(root, "one.png"), path.join(root, "two.jpg")],
    });
  });

  it("rejects a non-positive concurrency", async () => {
    const outcome = await service.runIndexing({ directory: root, concurrency: 0 });
    expect(outcome).toEqual({ ok: false, kind: "validation", message: "concurrency must be a positive integer" });
  });

  it("fails indexing a missing directory", async () => {
    const outcome = await service.runIndexing({ directory: path.join(root, "missing") });
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.kind).toBe("validation");
  });

  it("deletes, clears and reports stats", async () => {
    await service.upsert("/p/a.png", "default", [1, 0], "a");
    await service.upsert("/p/a.png", "color", [0, 1], "a color");
    await service.upsert("/p/b.png", "default", [1, 1], "b");

    expect(await service.stats()).toEqual({
      ok: true,
      value: { storeType: "Local", records: 3, photos: 2, provider: "fake" },
    });
    expect(await service.delete("/p/a.png", "color")).toEqual({ ok: true, value: 1 });
    expect(await service.delete("/p/a.png")).toEqual({ ok: true, value: 1 });
    expect(await service.clear()).toEqual({ ok: true, value: undefined });
    expect(await service.listPhotoPaths()).toEqual({ ok: true, value: [] });
  });

  it("lists the provider's models", async () => {
    expect(await service.listAvailableModels()).toEqual({ ok: true, value: ["fake-vision:latest"] });
  });
});
