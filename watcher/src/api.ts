import express, { type Request, type Response } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import type { Server } from "node:http";
import type { Orchestrator } from "./orchestrator.js";
import type { DeliveryStore } from "./store.js";

// <sourceChainId>:<nonce>
const DELIVERY_KEY_REGEX = /^\d+:\d+$/;

export function createApiServer(
  orchestrator: Orchestrator,
  store: DeliveryStore,
): express.Express {
  const app = express();
  app.use(cors());

  app.use(
    rateLimit({
      windowMs: 1000,
      limit: 10,
      standardHeaders: "draft-7",
      legacyHeaders: false,
    }),
  );

  app.get("/health", (_req: Request, res: Response) => {
    try {
      const status = orchestrator.status();
      const healthy =
        status.state === "starting" ||
        status.state === "running" ||
        status.state === "stopping";
      res.status(healthy ? 200 : 503).json({
        status: healthy ? "healthy" : "unhealthy",
        state: status.state,
        cursor: status.cursor,
        lastTickAt: status.lastTickAt,
        lastTick: status.lastTick,
        lastError: status.lastError,
        deliveries: store.countByOutcome(),
      });
    } catch (err) {
      console.error("GET /health error:", err);
      res.status(500).json({ status: "unhealthy" });
    }
  });

  app.get("/deliveries/:key", (req: Request, res: Response) => {
    const key: unknown = req.params.key;
    if (typeof key !== "string" || !DELIVERY_KEY_REGEX.test(key)) {
      res.status(400).json({ error: "Invalid delivery key" });
      return;
    }

    const attempts = store.getAttempts(key);
    if (attempts.length === 0) {
      res.status(404).json({ error: "Delivery not found" });
      return;
    }

    res.status(200).json({ deliveryKey: key, attempts });
  });

  return app;
}

/** Resolves once `app` listens on `port`; rejects with the listen error. */
export function listenApiServer(
  app: express.Express,
  port: number,
  host?: string,
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const onListen = (err?: Error) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(server);
    };
    const server =
      host === undefined
        ? app.listen(port, onListen)
        : app.listen(port, host, onListen);
  });
}
