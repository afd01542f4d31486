import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server } from "http";
import { sessionSchemas, validate } from "./middleware/validation";
import type { TurnRouter } from "./turnRouter";
import { handleRouteError, NotFoundError } from "./utils/errorHandler";

/**
 * Route handlers for the session API, kept apart from Express wiring so they
 * can be called with plain request/response objects.
 */
export function createSessionHandlers(router: TurnRouter) {
  return {
    async runTurn(req: Request, res: Response): Promise<void> {
      try {
        const { sessionId } = req.params;
        const { userId, userInput } = sessionSchemas.turn.parse(req.body);
        const state = await router.runTurn({ sessionId, userId, userInput });
        res.json({ state });
      } catch (error) {
        handleRouteError(res, error, "Sessions");
      }
    },

    async resumeTurn(req: Request, res: Response): Promise<void> {
      try {
        const { sessionId } = req.params;
        const { userId } = sessionSchemas.resume.parse(req.body ?? {});
        const state = await router.resumeTurn(sessionId, userId);
        res.json({ state });
      } catch (error) {
        handleRouteError(res, error, "Sessions");
      }
    },

    async getSession(req: Request, res: Response): Promise<void> {
      try {
        const { sessionId } = req.params;
        const checkpoint = await router.getState(sessionId);
        if (!checkpoint) {
          throw new NotFoundError(`Session ${sessionId}`);
        }
        res.json({ checkpoint });
      } catch (error) {
        handleRouteError(res, error, "Sessions");
      }
    },
  };
}

export function registerRoutes(app: Express, router: TurnRouter): Server {
  const handlers = createSessionHandlers(router);
  const params = validate({ params: sessionSchemas.params });

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post("/api/sessions/:sessionId/turns", params, handlers.runTurn);
  app.post("/api/sessions/:sessionId/resume", params, handlers.resumeTurn);
  app.get("/api/sessions/:sessionId", params, handlers.getSession);

  // Errors passed to next(), e.g. by the validation middleware or the JSON body parser
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    handleRouteError(res, err, "Express");
  });

  const httpServer = createServer(app);

  return httpServer;
}
