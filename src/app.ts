import express from "express";
import cors from "cors";
import swaggerUi from "swagger-ui-express";
import swaggerSpec from "./config/swaggerConfig";
import { categoryRoutes } from "./routes/categoryRoutes";
import { questionRoutes } from "./routes/questionRoutes";
import { quizRoutes } from "./routes/quizRoutes";
import { errorHandler, routeNotFound } from "./middleware/errorHandler";
import { requestLogger } from "./middleware/requestLogger";
import type { RandomSource } from "./services/quizService";
import type { TriviaStore } from "./store/TriviaStore";

export interface AppOptions {
  corsOrigin?: string;
  logRequests?: boolean;
  random?: RandomSource;
}

export const createApp = (
  store: TriviaStore,
  { corsOrigin = "*", logRequests = true, random }: AppOptions = {}
) => {
  const app = express();

  app.use(
    cors({
      origin: corsOrigin,
      methods: ["GET", "POST", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
    })
  );
  app.use(express.json());
  if (logRequests) app.use(requestLogger);

  app.use("/api-docs", swaggerUi.serve, swaggerUi.setup(swaggerSpec));

  app.get("/healthcheck", (_req, res) => {
    res.status(200).send("OK");
  });

  // Register routes
  const categories = categoryRoutes(store);
  app.use("/categories", categories);
  app.use("/category", categories);
  app.use("/questions", questionRoutes(store));
  app.use("/quizzes", quizRoutes(store, random));

  app.use(routeNotFound);
  app.use(errorHandler);

  return app;
};
