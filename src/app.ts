import express from "express";
import cors from "cors";
import type { AppConfig } from "./config/env";
import { home } from "./controllers/page.controller";
import { index, show } from "./controllers/user.controller";
import { errorHandler, notFound } from "./middleware/errors";
import { requestLogger } from "./middleware/logger";

export const createApp = (config: AppConfig) => {
  const app = express();

  app.use(cors());
  if (config.logRequests) {
    app.use(requestLogger);
  }
  app.use((_req, res, next) => {
    res.locals.appName = config.appName;
    next();
  });

  app.get("/", home);

  //Users
  app.get("/users", index);
  app.get("/users/:id", show);

  app.use(notFound);
  app.use(errorHandler);

  return app;
};
