import type { Express } from "express";
import { createServer, type Server } from "http";
import type { CoordinatorStats } from "./coordinator/commandCoordinator";
import type { IStorage } from "./storage";
import { handleRouteError, NotFoundError, type JsonResponse } from "./utils/errorHandler";

export interface StatsSource {
  getStats(): CoordinatorStats;
}

export interface RouteDeps {
  coordinator: StatsSource;
  exchanges: Pick<IStorage, "getExchangesByEvent">;
  isDiscordReady: () => boolean;
  startedAt: Date;
  now?: () => Date;
}

export function healthHandler(deps: RouteDeps) {
  return (_req: unknown, res: JsonResponse) => {
    try {
      const now = deps.now?.() ?? new Date();
      const discordReady = deps.isDiscordReady();
      res.status(discordReady ? 200 : 503).json({
        status: discordReady ? "ok" : "degraded",
        discordReady,
        uptimeSeconds: Math.floor((now.getTime() - deps.startedAt.getTime()) / 1000),
      });
    } catch (error) {
      handleRouteError(res, error, "Health");
    }
  };
}

export function statsHandler(deps: RouteDeps) {
  return (_req: unknown, res: JsonResponse) => {
    try {
      res.json(deps.coordinator.getStats());
    } catch (error) {
      handleRouteError(res, error, "Stats");
    }
  };
}

/**
 * Delivery history of one inbound event: the answer the bot posted, or
 * the failure notice it sent instead.
 */
export function exchangesHandler(deps: RouteDeps) {
  return async (req: { params: { eventId?: string } }, res: JsonResponse) => {
    try {
      const eventId = req.params.eventId ?? "";
      const exchanges = await deps.exchanges.getExchangesByEvent(eventId);
      if (exchanges.length === 0) {
        throw new NotFoundError("Exchange");
      }
      res.json({ eventId, exchanges });
    } catch (error) {
      handleRouteError(res, error, "Exchanges");
    }
  };
}

export function registerRoutes(app: Express, deps: RouteDeps): Server {
  app.get("/api/health", healthHandler(deps));
  app.get("/api/coordinator/stats", statsHandler(deps));
  app.get("/api/exchanges/:eventId", exchangesHandler(deps));

  return createServer(app);
}
