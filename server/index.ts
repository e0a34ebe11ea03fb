import express from "express";
import { createServer } from "http";
import { registerRoutes } from "./routes";
import { loadLocalEnvFiles, loadRuntimeConfig } from "./config";

loadLocalEnvFiles();
const config = loadRuntimeConfig();

const app = express();
app.use(express.json({ limit: "1mb" }));

const httpServer = createServer(app);
await registerRoutes(httpServer, app, config);

httpServer.listen(config.port, () => {
  console.log(`[server] Listening on port ${config.port}`);
});
