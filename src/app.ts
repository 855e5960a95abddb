// src/app.ts
import express from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import type { Database } from "./db/database";
import { healthRouter } from "./routes/health";
import { customersRouter } from "./routes/customers";
import { moviesRouter } from "./routes/movies";
import { rentalsRouter } from "./routes/rentals";
import { lateReturnsRouter } from "./routes/lateReturns";
import { reportsRouter } from "./routes/reports";
import { errorHandler } from "./utils/errors";

export type AppOptions = {
  /** morgan request logging, on unless turned off (tests) */
  requestLog?: boolean;
};

export function createApp(db: Database, opts: AppOptions = {}) {
  const app = express();
  app.use(helmet());
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: "1mb" }));
  if (opts.requestLog ?? true) app.use(morgan("dev"));

  app.use("/health", healthRouter(db));
  app.use("/api/customers", customersRouter(db));
  app.use("/api/movies", moviesRouter(db));
  app.use("/api/rentals", rentalsRouter(db));
  app.use("/api/late-returns", lateReturnsRouter(db));
  app.use("/api/reports", reportsRouter(db));

  app.use((_req, res) => {
    res.status(404).json({ error: "route_not_found" });
  });
  app.use(errorHandler);

  return app;
}
