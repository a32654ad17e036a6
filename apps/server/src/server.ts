import "dotenv/config";
import { createApp } from "./app";
import { env } from "./config/env";
import { createSqliteStore } from "./db/sqlite-store";

const start = async (): Promise<void> => {
  const store = await createSqliteStore(env.DATABASE_PATH);
  const server = createApp({ store }).listen(env.PORT, () => {
    // eslint-disable-next-line no-console
    console.log(`Library records API running on http://localhost:${env.PORT} (database: ${env.DATABASE_PATH})`);
  });

  const gracefulShutdown = (): void => {
    server.close(() => {
      store.close();
      process.exit(0);
    });
  };

  process.on("SIGINT", gracefulShutdown);
  process.on("SIGTERM", gracefulShutdown);
};

start().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Failed to start server", error);
  process.exit(1);
});
