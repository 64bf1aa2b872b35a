import express from "express";
import cors from "cors";
import type { RoutePlanningServices } from "@surface-route/routing";
import type { ServerConfig } from "./config.js";
import { HealthController } from "./controllers/health.controller.js";
import { RouteController } from "./controllers/route.controller.js";
import { errorHandler } from "./middleware/error-handler.js";
import { RoutePlanningService } from "./services/route-planning.service.js";

/** `services` replaces the service clients, e.g. with in-process fakes */
export function createApp(
  config: ServerConfig,
  services?: RoutePlanningServices,
): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: "5mb" }));

  const routes = new RouteController(new RoutePlanningService(config, services));
  const health = new HealthController();

  const api = express.Router();
  api.get("/health", health.handle);
  api.post("/routes/optimal", routes.handle);
  app.use("/api", api);

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
