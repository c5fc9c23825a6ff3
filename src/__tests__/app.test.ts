import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import type { Server } from "http";
import { createApp } from "../app.js";
import { IntentService } from "../service.js";
import { clearIntentsCache } from "../intents/store.js";

describe("HTTP app", () => {
  let dir: string;
  let file: string;
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    dir = mkdtempSync(join(tmpdir(), "intent-app-"));
    file = join(dir, "intents.json");
    writeFileSync(
      file,
      JSON.stringify([
        { name: "openApp", pattern: "(?:jarvis\\s)?open\\s+(.+)", entityKeys: ["appName"], keywords: ["open"] },
      ])
    );
    clearIntentsCache();
    const service = new IntentService({ intentsFile: file, keywordThreshold: 75 });
    server = createApp(service).listen(0, "127.0.0.1");
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address = server.address();
    if (typeof address !== "object" || address === null) throw new Error("server is not listening on a port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    rmSync(dir, { recursive: true, force: true });
  });

  function post(path: string, body?: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  it("resolves a command", async () => {
    const res = await post("/api/resolve", { text: "Jarvis open Chrome" });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ intent: "openApp", params: { appName: "chrome" }, matched: true });
  });

  it("returns unknown for unrecognized text", async () => {
    const res = await post("/api/resolve", { text: "sing me a song" });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ intent: "unknown", params: {}, matched: false });
  });

  it("treats empty text as unrecognized", async () => {
    const res = await post("/api/resolve", { text: "   " });
    expect(await res.json()).toEqual({ intent: "unknown", params: {}, matched: false });
  });

  it("rejects a body without text", async () => {
    const res = await post("/api/resolve", { message: "open chrome" });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "text 必须是字符串" });
  });

  it("lists intents", async () => {
    const res = await fetch(`${baseUrl}/api/intents`);
    expect(await res.json()).toEqual({ intents: ["openApp"], keywordThreshold: 75 });
  });

  it("reloads intents and keeps serving the old set on failure", async () => {
    writeFileSync(file, JSON.stringify([{ name: "broken", pattern: "[" }]));
    const failed = await post("/api/intents/reload");
    expect(failed.status).toBe(500);
    expect((await post("/api/resolve", { text: "open mail" })).status).toBe(200);

    writeFileSync(file, JSON.stringify([{ name: "closeApp", pattern: "close\\s+(.+)", entityKeys: ["appName"] }]));
    const ok = await post("/api/intents/reload");
    expect(ok.status).toBe(200);
    expect(await ok.json()).toEqual({ intents: ["closeApp"] });
    expect(await (await post("/api/resolve", { text: "close mail" })).json()).toEqual({
      intent: "closeApp",
      params: { appName: "mail" },
      matched: true,
    });
  });

  it("reports health", async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(await res.json()).toEqual({ status: "ok" });
  });
});
