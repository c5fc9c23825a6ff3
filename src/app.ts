/**
 * HTTP 应用：POST /api/resolve 返回结构化命令
 * 与监听端口分离（见 server.ts），便于测试直接挂载
 */

import express from "express";
import cors from "cors";
import { toCommandResponse } from "./resolver.js";
import type { IntentService } from "./service.js";

export function createApp(service: IntentService): express.Express {
  const app = express();
  app.use(cors({ origin: true }));
  app.use(express.json());

  app.post("/api/resolve", (req, res) => {
    const body: unknown = req.body;
    const text = typeof body === "object" && body !== null && "text" in body ? body.text : undefined;
    if (typeof text !== "string") {
      res.status(400).json({ error: "text 必须是字符串" });
      return;
    }
    try {
      res.json(toCommandResponse(service.resolve(text)));
    } catch (e) {
      console.error("Resolve error:", e);
      res.status(500).json({ error: e instanceof Error ? e.message : "服务器错误" });
    }
  });

  app.get("/api/intents", (_req, res) => {
    res.json({ intents: service.listIntents(), keywordThreshold: service.current.keywordThreshold });
  });

  app.post("/api/intents/reload", (_req, res) => {
    try {
      service.reload();
      res.json({ intents: service.listIntents() });
    } catch (e) {
      console.warn("意图重新加载失败，继续使用旧定义:", e);
      res.status(500).json({ error: e instanceof Error ? e.message : "重新加载失败" });
    }
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  return app;
}
