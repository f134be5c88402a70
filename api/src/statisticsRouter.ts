// api/src/statisticsRouter.ts
import { Router, Request, Response } from "express";
import { AppError, asyncHandler } from "./middleware/errorHandler.js";
import { ExamplesQuerySchema, UserIdParamSchema, validate } from "./validation.js";
import type { ViewRegistry } from "./viewRegistry.js";

function userIdFrom(req: Request): string {
  const parsed = validate(UserIdParamSchema, req.params);
  if (!parsed.success) throw new AppError(parsed.error, 400, { code: "validation_error" });
  return parsed.data.userId;
}

export function createStatisticsRouter(registry: ViewRegistry): Router {
  const statistics = Router();

  // GET: примеры упражнений для классификации
  statistics.get(
    "/users/:userId/exercise-examples",
    asyncHandler(async (req: Request, res: Response) => {
      const userId = userIdFrom(req);
      const query = validate(ExamplesQuerySchema, req.query);
      if (!query.success) throw new AppError(query.error, 400, { code: "validation_error" });

      const { sessionId, muscleGroupKeys } = query.data;
      const result = await registry.getExamples({ kind: "GetExamples", userId, sessionId, muscleGroupKeys });
      if (!result.success) {
        throw new AppError("No examples", 404, { code: result.error, details: { sessionId: sessionId ?? null } });
      }
      res.json({ examples: result.data });
    })
  );

  // GET: последние рекомендации
  statistics.get(
    "/users/:userId/exercise-suggestions",
    asyncHandler(async (req: Request, res: Response) => {
      const userId = userIdFrom(req);
      res.json(await registry.getSuggestions({ kind: "GetSuggestions", userId }));
    })
  );

  statistics.get("/users/:userId/placement", (req: Request, res: Response) => {
    res.json(registry.placementOf(userIdFrom(req)));
  });

  return statistics;
}
