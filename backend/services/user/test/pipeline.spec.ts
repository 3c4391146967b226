// backend/services/user/test/pipeline.spec.ts
import request from "supertest";
import express, { type Router } from "express";
import { describe, it, expect, vi } from "vitest";
import {
  buildPipeline,
  createServiceApp,
  mountPipeline,
} from "@shared/app/createServiceApp";
import { FaultLog } from "@shared/http/faultLog";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import type { RequestLogSink } from "@shared/middleware/logRequestResponse";
import { zInternalError, zProblem } from "@shared/contracts/common";
import { createUserApp } from "../src/app";
import { mountUserRoutes } from "../src/routes/userRoutes";
import { UserService } from "../src/services/userService";
import { InMemoryUserStore, type UserStore } from "../src/repo/userStore";
import { SEED_USERS } from "../src/models/User";
import { TOKEN } from "./helpers/http";

/** User routes plus test-only routes that fail in different ways. */
function appWithFaultyRoutes(
  faults: FaultLog,
  opts: { bodyLimit?: string; logSink?: RequestLogSink } = {}
) {
  const users = new UserService(new InMemoryUserStore(SEED_USERS));
  return createServiceApp({
    serviceName: "user-test",
    authToken: TOKEN,
    faults,
    bodyLimit: opts.bodyLimit,
    logSink: opts.logSink,
    mountRoutes: (router: Router) => {
      mountUserRoutes(router, { users, faults });
      router.get("/__throw", () => {
        throw new Error("boom");
      });
      router.get(
        "/__reject",
        asyncHandler(async () => {
          throw new Error("async boom");
        })
      );
      router.get("/__late", (_req, res, next) => {
        res.status(200).type("text/plain");
        res.write("partial");
        next(new Error("late"));
      });
      router.get("/__stream", (_req, res) => {
        res.status(200).type("text/plain");
        res.write("a");
        res.write(Buffer.from("b"));
        res.end("c");
      });
      router.post("/__echo", (req, res) => {
        res.json(req.body);
      });
    },
  });
}

class OfflineStore implements UserStore {
  private fail(): Promise<never> {
    return Promise.reject(new Error("store offline"));
  }
  list() {
    return this.fail();
  }
  findById() {
    return this.fail();
  }
  insert() {
    return this.fail();
  }
  update() {
    return this.fail();
  }
  remove() {
    return this.fail();
  }
  count() {
    return this.fail();
  }
}

describe("pipeline composition", () => {
  it("builds stages in a fixed order", () => {
    const stages = buildPipeline({
      serviceName: "user-test",
      authToken: TOKEN,
      faults: new FaultLog(),
      mountRoutes: () => undefined,
    });
    expect(stages.map((s) => s.name)).toEqual([
      "requestId",
      "httpLogger",
      "authenticate",
      "logRequestResponse",
      "jsonBody",
      "routes",
      "notFound",
      "errorBoundary",
      "exceptionHandler",
    ]);
    expect(stages.filter((s) => s.kind === "error").map((s) => s.name)).toEqual(
      ["errorBoundary", "exceptionHandler"]
    );
  });

  it("refuses duplicate stage names", () => {
    const noop: express.RequestHandler = (_req, _res, next) => next();
    expect(() =>
      mountPipeline(express(), [
        { name: "a", kind: "request", handler: noop },
        { name: "a", kind: "request", handler: noop },
      ])
    ).toThrow('PIPELINE_INVALID: duplicate stage "a"');
  });

  it("rejects an empty shared secret", () => {
    expect(() => createUserApp({ authToken: "" })).toThrow(
      "sharedSecretAuth requires a token"
    );
  });
});

describe("request/response logging stage", () => {
  it("logs the request line and the response body", async () => {
    const sink = { info: vi.fn() };
    const app = createUserApp({ authToken: TOKEN, logSink: sink });

    await request(app).get("/users/1").set("Authorization", TOKEN);

    expect(sink.info.mock.calls.map((c) => c[1])).toEqual([
      "Incoming request: GET /users/1",
      'Outgoing response: 200 {"id":1,"name":"Alice","email":"alice@example.com"}',
    ]);
  });

  it("logs plain-text bodies as sent", async () => {
    const sink = { info: vi.fn() };
    const app = createUserApp({ authToken: TOKEN, logSink: sink });

    await request(app)
      .put("/users/1")
      .set("Authorization", TOKEN)
      .send({ name: "Alicia", email: "alicia@example.com" });

    expect(sink.info.mock.calls.map((c) => c[1])).toEqual([
      "Incoming request: PUT /users/1",
      "Outgoing response: 200 User updated successfully",
    ]);
  });

  it("logs every chunk of a streamed body", async () => {
    const sink = { info: vi.fn() };
    const app = appWithFaultyRoutes(new FaultLog(), { logSink: sink });

    const res = await request(app).get("/__stream").set("Authorization", TOKEN);

    expect(res.text).toBe("abc");
    expect(sink.info.mock.calls.map((c) => c[1])).toEqual([
      "Incoming request: GET /__stream",
      "Outgoing response: 200 abc",
    ]);
  });

  it("logs a body written before a late fault", async () => {
    const sink = { info: vi.fn() };
    const app = appWithFaultyRoutes(new FaultLog(), { logSink: sink });

    await request(app).get("/__late").set("Authorization", TOKEN);

    expect(sink.info.mock.calls.map((c) => c[1])).toEqual([
      "Incoming request: GET /__late",
      "Outgoing response: 200 partial",
    ]);
  });

  it("never sees requests rejected by authentication", async () => {
    const sink = { info: vi.fn() };
    const app = createUserApp({ authToken: TOKEN, logSink: sink });

    await request(app).get("/users");

    expect(sink.info).not.toHaveBeenCalled();
  });
});

describe("error boundary", () => {
  it("maps a thrown fault to 500 and records it", async () => {
    const faults = new FaultLog();
    const app = appWithFaultyRoutes(faults);

    const res = await request(app)
      .get("/__throw")
      .set("Authorization", TOKEN)
      .set("x-request-id", "req-boom");

    expect(res.status).toBe(500);
    expect(zInternalError.parse(res.body)).toEqual({
      error: "Internal server error.",
    });
    expect(faults.count()).toBe(1);
    expect(faults.last()?.error.message).toBe("boom");
    expect(faults.last()?.requestId).toBe("req-boom");
  });

  it("catches async rejections", async () => {
    const faults = new FaultLog();
    const app = appWithFaultyRoutes(faults);

    const res = await request(app).get("/__reject").set("Authorization", TOKEN);

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: "Internal server error." });
    expect(faults.last()?.error.message).toBe("async boom");
  });

  it("GET /error reports the last recorded fault", async () => {
    const faults = new FaultLog();
    const app = appWithFaultyRoutes(faults);

    await request(app).get("/__throw").set("Authorization", TOKEN);
    const res = await request(app)
      .get("/error")
      .set("Authorization", TOKEN)
      .set("x-request-id", "req-diag");

    expect(res.status).toBe(500);
    expect(zProblem.parse(res.body)).toEqual({
      type: "about:blank",
      title: "An error occurred while processing your request.",
      status: 500,
      detail: "boom",
      instance: "req-diag",
    });
  });

  it("answers 413 for an oversized body", async () => {
    const app = appWithFaultyRoutes(new FaultLog(), { bodyLimit: "20b" });

    const res = await request(app)
      .post("/__echo")
      .set("Authorization", TOKEN)
      .send({ text: "this body is longer than twenty bytes" });

    expect(res.status).toBe(413);
    expect(res.body).toEqual({ Message: "Request body too large" });
  });

  it("hands faults after headers were sent to the exception handler", async () => {
    const faults = new FaultLog();
    const app = appWithFaultyRoutes(faults);

    const res = await request(app).get("/__late").set("Authorization", TOKEN);

    expect(res.status).toBe(200);
    expect(res.text).toBe("partial");
    expect(faults.count()).toBe(1);
    expect(faults.last()?.error.message).toBe("late");
  });
});

describe("handler failure boundary", () => {
  it("turns a store failure into a problem body with the fault message", async () => {
    const faults = new FaultLog();
    const app = createUserApp({
      authToken: TOKEN,
      store: new OfflineStore(),
      faults,
    });

    const res = await request(app)
      .get("/users")
      .set("Authorization", TOKEN)
      .set("x-request-id", "req-offline");

    expect(res.status).toBe(500);
    expect(res.headers["content-type"]).toMatch(/^application\/problem\+json/);
    expect(res.body).toEqual({
      type: "about:blank",
      title: "An error occurred",
      status: 500,
      detail: "store offline",
      instance: "req-offline",
    });
    // absorbed by the handler; the pipeline never saw it
    expect(faults.count()).toBe(0);
  });
});
