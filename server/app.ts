import express, { type NextFunction, type Request, type Response } from "express";
import { createServer, type Server } from "http";
import type { AppConfig } from "./config";
import { log } from "./log";
import { registerRoutes } from "./routes";

export async function createApp(config: Pick<AppConfig, "logRequests">): Promise<Server> {
  const app = express();
  app.use(express.json());
  app.set("logRequests", config.logRequests);

  if (config.logRequests) {
    app.use((req: Request, res: Response, next: NextFunction) => {
      const start = Date.now();
      const path = req.path;

      res.on("finish", () => {
        if (path.startsWith("/api")) {
          log(`${req.method} ${path} ${res.statusCode} in ${Date.now() - start}ms`);
        }
      });

      next();
    });
  }

  const httpServer = createServer(app);
  await registerRoutes(httpServer, app);

  // express.json() parse failures and anything a route let through
  app.use((err: Error & { status?: number; statusCode?: number }, _req: Request, res: Response, _next: NextFunction) => {
    const status = err.status || err.statusCode || 500;
    if (status >= 500) {
      console.error("Unhandled request error:", err);
    }
    res.status(status).json({ error: status >= 500 ? "Internal Server Error" : err.message });
  });

  return httpServer;
}
