import type { Server } from "http";
import fetch from "node-fetch";
import sharp from "sharp";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { createApp } from "./app";
import { AspectIndex } from "./services/aspectIndex";
import { EmbeddingProvider } from "./services/embeddings";
import { InMemoryVectorStore } from "./services/inMemoryVectorStore";
import { PhotoSearchService } from "./services/photoSearch";
import { FakeBackend, bagOfWords } from "./tests/fakes";

describe("HTTP API", () => {
  let server: Server;
  let baseUrl: string;
  let index: AspectIndex;

  beforeAll(async () => {
    index = new AspectIndex(new InMemoryVectorStore({ name: "photos" }));
    const service = new PhotoSearchService(index, new EmbeddingProvider(new FakeBackend(() => "a blue boat")), {
      concurrency: 2,
    });
    server = await new Promise<Server>((resolve) => {
      const s = createApp(service).listen(0, "127.0.0.1", () => resolve(s));
    });
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("expected a TCP address");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  beforeEach(async () => {
    await index.clear();
    await index.upsert("/p/car.png", "default", bagOfWords("a red car"), "a red car");
    await index.upsert("/p/boat.png", "default", bagOfWords("a blue boat"), "a blue boat");
    await index.upsert("/p/boat.png", "color", bagOfWords("blue"), "blue");
  });

  function send(method: string, path: string, body?: unknown) {
    return fetch(`${baseUrl}${path}`, {
      method,
      headers: { "Content-Type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  it("reports health with store statistics", async () => {
    const res = await send("GET", "/health");
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      status: "ok",
      storage: { type: "Local", records: 3, photos: 2 },
      provider: "fake",
    });
  });

  it("searches by text", async () => {
    const res = await send("POST", "/query/text", { text: "red car", aspect: "default", k: 1 });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      ok: true,
      results: [{ photoPath: "/p/car.png", aspectName: "default", distance: expect.any(Number), description: "a red car" }],
    });
  });

  it("searches by a base64 image", async () => {
    const png = await sharp({ create: { width: 8, height: 8, channels: 3, background: { r: 0, g: 0, b: 200 } } })
      .png()
      .toBuffer();

    const res = await send("POST", "/query/image", { imageBase64: png.toString("base64"), aspect: "default", k: 1 });
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.results.map((r: { photoPath: string }) => r.photoPath)).toEqual(["/p/boat.png"]);
  });

  it("rejects a text query without text", async () => {
    const res = await send("POST", "/query/text", { text: "" });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ ok: false, kind: "validation" });
  });

  it("rejects an image query without an image", async () => {
    const res = await send("POST", "/query/image", { k: 3 });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      ok: false,
      kind: "validation",
      error: "imageBase64: Provide either 'imageBase64' or 'photoPath'",
    });
  });

  it("maps an undecodable image to 422", async () => {
    const res = await send("POST", "/query/image", { imageBase64: Buffer.from("nope").toString("base64") });
    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ ok: false, kind: "image_read" });
  });

  it("lists photos and their aspects", async () => {
    expect(await (await send("GET", "/photos")).json()).toEqual({ ok: true, photos: ["/p/boat.png", "/p/car.png"] });

    const res = await send("GET", `/photos/aspects?path=${encodeURIComponent("/p/boat.png")}`);
    const body = await res.json();
    expect(body.aspects.map((a: { aspectName: string }) => a.aspectName)).toEqual(["color", "default"]);
  });

  it("deletes one aspect and then the whole photo", async () => {
    expect(await (await send("DELETE", "/photos", { photoPath: "/p/boat.png", aspect: "color" })).json()).toEqual({
      ok: true,
      deleted: 1,
    });
    expect(await (await send("DELETE", "/photos", { photoPath: "/p/boat.png" })).json()).toEqual({
      ok: true,
      deleted: 1,
    });
    expect(await (await send("DELETE", "/photos", { photoPath: "/p/boat.png" })).json()).toEqual({
      ok: true,
      deleted: 0,
    });
  });

  it("clears the store", async () => {
    expect(await (await send("DELETE", "/photos/all")).json()).toEqual({ ok: true });
    expect(await index.count()).toBe(0);
  });

  it("fails indexing a directory that does not exist", async () => {
    const res = await send("POST", "/ingest", { directory: "/definitely/not/here" });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      ok: false,
      kind: "validation",
      error: expect.stringContaining("Cannot read directory /definitely/not/here"),
    });
  });

  it("lists provider models", async () => {
    expect(await (await send("GET", "/models")).json()).toEqual({ ok: true, models: ["fake-vision:latest"] });
  });
});
