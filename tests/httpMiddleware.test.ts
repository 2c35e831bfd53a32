import { describe, it } from "node:test";
import assert from "node:assert/strict";
import request from "supertest";
import { mediaTypeOf } from "../server/middleware/http";
import { buildOriginMatchers } from "../server/app";
import { createTestApp } from "./testHelpers";

describe("mediaTypeOf", () => {
  it("drops parameters and normalises case", () => {
    assert.equal(mediaTypeOf("Application/JSON; charset=utf-8"), "application/json");
    assert.equal(mediaTypeOf("text/plain"), "text/plain");
  });

  it("returns undefined for a missing or empty header", () => {
    assert.equal(mediaTypeOf(undefined), undefined);
    assert.equal(mediaTypeOf(""), undefined);
    assert.equal(mediaTypeOf(" ; charset=utf-8"), undefined);
  });
});

describe("buildOriginMatchers", () => {
  const [exact, wildcard] = buildOriginMatchers([
    "https://admin.example.test",
    "https://*.shop.example.test",
  ]);

  it("matches exact origins", () => {
    assert.equal(exact?.("https://admin.example.test"), true);
    assert.equal(exact?.("https://admin.example.test:8443"), false);
  });

  it("expands wildcards without treating dots as patterns", () => {
    assert.equal(wildcard?.("https://eu.shop.example.test"), true);
    assert.equal(wildcard?.("https://eu.shopXexample.test"), false);
    assert.equal(wildcard?.("http://eu.shop.example.test"), false);
  });
});

describe("CORS", () => {
  const { app } = createTestApp({ allowedOrigins: ["https://*.example.test"] });

  it("allows configured origins", async () => {
    const res = await request(app).get("/health").set("Origin", "https://admin.example.test");
    assert.equal(res.headers["access-control-allow-origin"], "https://admin.example.test");
  });

  it("omits CORS headers for other origins", async () => {
    const res = await request(app).get("/health").set("Origin", "https://elsewhere.test");
    assert.equal(res.status, 200);
    assert.equal(res.headers["access-control-allow-origin"], undefined);
  });

  it("allows any origin when none are configured", async () => {
    const { app: open } = createTestApp();
    const res = await request(open).get("/health").set("Origin", "https://elsewhere.test");
    assert.equal(res.headers["access-control-allow-origin"], "https://elsewhere.test");
  });
});
