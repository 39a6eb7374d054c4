import express, { Express } from "express";
import cors from "cors";
import { apiKeyAuth } from "./middleware/apiKeyAuth";
import { createLeadsRouter, LeadsRouterDeps } from "./routes/leads";
import scoreRouter from "./routes/score";

export interface AppOptions extends LeadsRouterDeps {
  /** Empty string disables auth (dev mode) */
  operatorApiKey: string;
}

export function createApp(options: AppOptions): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      email: options.emailSender.getConfigStatus().configured ? "configured" : "not configured",
      ai: options.pipeline.generator ? options.pipeline.generator.name : "disabled",
      weather: options.pipeline.weatherProvider ? options.pipeline.weatherProvider.name : "estimate",
    });
  });

  // Mount routes
  const auth = apiKeyAuth(options.operatorApiKey);
  app.use("/score", auth, scoreRouter);
  app.use("/leads", auth, createLeadsRouter(options));

  return app;
}
