// backend/services/order/test/order.routes.spec.ts
import { describe, it, expect, beforeEach, vi } from "vitest";
import request from "supertest";
import pino from "pino";
import type { Express } from "express";
import { createApp } from "../src/app";
import { OrderService } from "../src/services/orderService";
import { orderContract } from "../src/contracts/order.contract";
import {
  InMemoryOrderRepository,
  failingRepository,
} from "./helpers/memoryOrderRepo";

const FIXED = new Date("2026-01-02T03:04:05.000Z");
const silent = pino({ level: "silent" });

describe("/api/orders", () => {
  let repo: InMemoryOrderRepository;
  let app: Express;

  beforeEach(() => {
    repo = new InMemoryOrderRepository();
    const service = new OrderService(repo, { now: () => FIXED, logger: silent });
    app = createApp({ service, serviceName: "order-test" });
  });

  it("POST creates an order and returns it with 200", async () => {
    const res = await request(app)
      .post("/api/orders")
      .send({ customerName: "John", amount: 123.45 })
      .expect(200);

    expect(res.headers["content-type"]).toMatch(/^application\/json/);
    expect(res.body).toEqual({
      id: 1,
      customerName: "John",
      amount: 123.45,
      createdAt: "2026-01-02T03:04:05.000Z",
    });
    expect(orderContract.safeParse(res.body).success).toBe(true);
  });

  it("POST with a blank name returns 400 and the field map", async () => {
    const save = vi.spyOn(repo, "save");
    const res = await request(app)
      .post("/api/orders")
      .send({ customerName: "", amount: 50 })
      .expect(400);

    expect(res.body).toEqual({ customerName: "Customer name is required" });
    expect(save).not.toHaveBeenCalled();
  });

  it("POST reports every failing field", async () => {
    const res = await request(app)
      .post("/api/orders")
      .send({ amount: 0.01 })
      .expect(400);

    expect(res.body).toEqual({
      customerName: "Customer name is required",
      amount: "Amount must be at least 0.1",
    });
  });

  it("POST with no body reports both fields as required", async () => {
    const res = await request(app).post("/api/orders").expect(400);
    expect(res.body).toEqual({
      customerName: "Customer name is required",
      amount: "Amount is required",
    });
  });

  it("POST with malformed JSON returns a Problem+JSON 400", async () => {
    const res = await request(app)
      .post("/api/orders")
      .set("Content-Type", "application/json")
      .send('{"customerName":')
      .expect(400);

    expect(res.headers["content-type"]).toMatch(/^application\/problem\+json/);
    expect(res.body).toMatchObject({
      type: "about:blank",
      title: "Bad Request",
      status: 400,
    });
  });

  it("POST with a form-encoded body returns a Problem+JSON 415", async () => {
    const save = vi.spyOn(repo, "save");
    const res = await request(app)
      .post("/api/orders")
      .set("x-request-id", "req-415")
      .type("form")
      .send("customerName=John&amount=5")
      .expect(415);

    expect(res.headers["content-type"]).toMatch(/^application\/problem\+json/);
    expect(res.body).toEqual({
      type: "about:blank",
      title: "Unsupported Media Type",
      status: 415,
      detail: "Request body must be application/json",
      instance: "req-415",
    });
    expect(save).not.toHaveBeenCalled();
  });

  it("POST accepts a JSON media type with a charset", async () => {
    await request(app)
      .post("/api/orders")
      .set("Content-Type", "application/json; charset=utf-8")
      .send(JSON.stringify({ customerName: "John", amount: 5 }))
      .expect(200);
  });

  it("GET returns an empty array when there are no orders", async () => {
    const res = await request(app).get("/api/orders").expect(200);
    expect(res.body).toEqual([]);
  });

  it("GET lists created orders in storage order", async () => {
    await request(app)
      .post("/api/orders")
      .send({ customerName: "Ann", amount: 10 })
      .expect(200);
    await request(app)
      .post("/api/orders")
      .send({ customerName: "Bob", amount: 0.1 })
      .expect(200);

    const res = await request(app).get("/api/orders").expect(200);
    expect(res.body).toEqual([
      {
        id: 1,
        customerName: "Ann",
        amount: 10,
        createdAt: "2026-01-02T03:04:05.000Z",
      },
      {
        id: 2,
        customerName: "Bob",
        amount: 0.1,
        createdAt: "2026-01-02T03:04:05.000Z",
      },
    ]);
  });

  it("echoes a caller-supplied request id", async () => {
    const res = await request(app)
      .get("/api/orders")
      .set("x-request-id", "req-123")
      .expect(200);
    expect(res.headers["x-request-id"]).toBe("req-123");
  });

  it("mints a request id when none is supplied", async () => {
    const res = await request(app).get("/api/orders").expect(200);
    expect(res.headers["x-request-id"]).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/
    );
  });
});

describe("storage failures", () => {
  const service = new OrderService(failingRepository(new Error("storage down")), {
    now: () => FIXED,
    logger: silent,
  });
  const app = createApp({ service, serviceName: "order-test" });

  it("GET renders a 500 Problem+JSON with the storage message", async () => {
    const res = await request(app)
      .get("/api/orders")
      .set("x-request-id", "req-500")
      .expect(500);

    expect(res.headers["content-type"]).toMatch(/^application\/problem\+json/);
    expect(res.body).toEqual({
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      detail: "storage down",
      instance: "req-500",
    });
  });

  it("POST of a valid order renders a 500 Problem+JSON", async () => {
    const res = await request(app)
      .post("/api/orders")
      .send({ customerName: "John", amount: 5 })
      .expect(500);
    expect(res.body.detail).toBe("storage down");
  });

  it("POST of an invalid order still returns 400 without touching storage", async () => {
    const res = await request(app)
      .post("/api/orders")
      .send({ customerName: "John" })
      .expect(400);
    expect(res.body).toEqual({ amount: "Amount is required" });
  });
});

describe("unknown routes", () => {
  const service = new OrderService(new InMemoryOrderRepository(), {
    logger: silent,
  });
  const app = createApp({ service, serviceName: "order-test" });

  it("returns Problem+JSON 404 under /api", async () => {
    const res = await request(app)
      .get("/api/nope")
      .set("x-request-id", "req-404")
      .expect(404);
    expect(res.body).toEqual({
      type: "about:blank",
      title: "Not Found",
      status: 404,
      detail: "Route not found",
      instance: "req-404",
    });
  });

  it("returns a bare 404 elsewhere", async () => {
    const res = await request(app).get("/favicon.ico").expect(404);
    expect(res.text).toBe("");
  });

  it("does not accept other verbs on the collection", async () => {
    await request(app).delete("/api/orders").expect(404);
  });
});
