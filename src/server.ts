import { createApp } from "./app";
import { loadConfig } from "./config/env";
import { connectDB, disconnectDB } from "./config/database";
import { mongoStore } from "./store/mongoStore";

const start = async (): Promise<void> => {
  const config = loadConfig();

  await connectDB(config.MONGO_URI);

  const app = createApp(mongoStore, {
    corsOrigin: config.CORS_ORIGIN,
    logRequests: config.LOG_REQUESTS,
  });

  const server = app.listen(config.PORT, () => {
    console.log(`Server is running on port ${config.PORT}`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close(() => {
      disconnectDB()
        .then(() => process.exit(0))
        .catch((error) => {
          console.error("Error while disconnecting:", error);
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
};

start().catch((error) => {
  console.error("Error starting trivia API:", error);
  process.exit(1);
});
