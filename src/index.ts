// src/index.ts
import { ENV } from "./env";
import { createApp } from "./app";
import { db, pool } from "./db/drizzle";

const app = createApp(db, { requestLog: ENV.NODE_ENV !== "test" });

const server = app.listen(ENV.PORT, () => {
  console.log(`🎬 rental api on http://localhost:${ENV.PORT}`);
});

function shutdown(signal: string) {
  console.log(`[server] ${signal} received, closing`);
  server.close(() => {
    pool
      .end()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error("[server] pool shutdown failed", err);
        process.exit(1);
      });
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
