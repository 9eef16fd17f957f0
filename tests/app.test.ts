import type { Server } from "http";
import express, { type Express } from "express";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { createApp } from "../src/app";
import { loadConfig, type AppConfig } from "../src/config/env";
import { errorHandler } from "../src/middleware/errors";

const listen = async (app: Express) => {
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Server is not listening on a TCP port");
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
};

const start = (config: AppConfig) => listen(createApp(config));

const stop = (server: Server) =>
  new Promise<void>((resolve, reject) =>
    server.close((error) => (error ? reject(error) : resolve()))
  );

describe("app routes", () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    ({ server, baseUrl } = await start(loadConfig({ LOG_REQUESTS: "false" })));
  });

  afterAll(() => stop(server));

  it("renders the welcome page", async () => {
    const res = await fetch(`${baseUrl}/`);
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/html; charset=utf-8");
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
    const body = await res.text();
    expect(body).toContain("<title>Welcome · Hello</title>");
    expect(body).toContain("<h1>Welcome to Hello!</h1>");
  });

  it("lists users", async () => {
    const res = await fetch(`${baseUrl}/users`);
    expect(res.status).toBe(200);
    const body = await res.text();
    expect(body).toContain("<h1>Listing Users</h1>");
    expect(body).toContain('<td><a href="/users/3">View</a></td>');
  });

  it("shows a single user", async () => {
    const res = await fetch(`${baseUrl}/users/2`);
    expect(res.status).toBe(200);
    const body = await res.text();
    expect(body).toContain("<title>Bruce · Hello</title>");
    expect(body).toContain("<p><b>Bruce</b> (2)</p>");
  });

  it("answers 404 for an unknown user", async () => {
    const res = await fetch(`${baseUrl}/users/999`);
    expect(res.status).toBe(404);
    expect(await res.text()).toContain("<p>No user with id 999.</p>");
  });

  it("answers 404 for an unknown route", async () => {
    const res = await fetch(`${baseUrl}/nope`);
    expect(res.status).toBe(404);
    expect(await res.text()).toContain(
      "<p>The page you were looking for does not exist.</p>"
    );
  });

  it("answers 400 without logging for a malformed user id", async () => {
    const logError = vi
      .spyOn(console, "error")
      .mockImplementation(() => undefined);
    try {
      const res = await fetch(`${baseUrl}/users/%E0%A4%A`);
      expect(res.status).toBe(400);
      const body = await res.text();
      expect(body).toContain("<title>Bad Request · Hello</title>");
      expect(body).toContain("<h1>Bad Request</h1>");
      expect(logError).not.toHaveBeenCalled();
    } finally {
      logError.mockRestore();
    }
  });
});

describe("error handler", () => {
  it("renders a 500 page inside the layout and logs the failure", async () => {
    const failure = new Error("lookup exploded");
    const app = express();
    app.use((_req, res, next) => {
      res.locals.appName = "Hello";
      next();
    });
    app.get("/boom", () => {
      throw failure;
    });
    app.use(errorHandler);

    const logError = vi
      .spyOn(console, "error")
      .mockImplementation(() => undefined);
    const { server, baseUrl } = await listen(app);

    try {
      const res = await fetch(`${baseUrl}/boom`);
      expect(res.status).toBe(500);
      const body = await res.text();
      expect(body.startsWith("<!DOCTYPE html>")).toBe(true);
      expect(body).toContain("<title>Internal Server Error · Hello</title>");
      expect(body).toContain("<h1>Internal Server Error</h1>");
      expect(body).not.toContain("lookup exploded");
      expect(body).not.toContain("app.test.ts");
      expect(logError).toHaveBeenCalledWith("Unhandled request error:", failure);
    } finally {
      logError.mockRestore();
      await stop(server);
    }
  });
});

describe("request logging", () => {
  it("logs one line per response when enabled", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const { server, baseUrl } = await start(loadConfig({}));

    try {
      await fetch(`${baseUrl}/users`);
      await vi.waitFor(() => expect(log).toHaveBeenCalledTimes(1));
      expect(log.mock.calls[0][0]).toMatch(/^GET \/users 200 \d+\.\dms$/);
    } finally {
      log.mockRestore();
      await stop(server);
    }
  });
});
