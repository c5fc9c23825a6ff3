/**
 * 意图解析 HTTP 服务
 * 配置从 .env / .env.local 加载（见 config.ts）
 */

import { getConfig } from "./config.js";
import { IntentService } from "./service.js";
import { createApp } from "./app.js";

const config = getConfig();
const service = new IntentService(config.resolver);
const app = createApp(service);

app.listen(config.server.port, () => {
  console.log(`Intent server listening on http://localhost:${config.server.port}`);
  console.log("POST /api/resolve - 解析单句指令");
  console.log("GET  /api/intents - 当前意图列表");
  console.log("POST /api/intents/reload - 重新加载意图文件");
  console.log(`已加载 ${service.listIntents().length} 个意图，阈值 ${config.resolver.keywordThreshold}`);
});
