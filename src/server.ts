// Load .env FIRST before any imports that depend on environment variables
import * as dotenv from "dotenv";
dotenv.config();

import http from "http";
import { createApp } from "./app";
import { getConfig } from "./config/env";

const config = getConfig();
const server = http.createServer(createApp(config));

server.on("error", (error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});

server.listen(config.port, config.host, () => {
  console.log(`Server running on http://${config.host}:${config.port}`);
});
