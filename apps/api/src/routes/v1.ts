import express, { type Request, type Response } from "express";
import {
  createMealPlanBodySchema,
  generatePlanQuerySchema,
  mealPlanIdParamSchema
} from "@mealgen/contracts";
import { sendDomainError } from "../lib/api-error.js";
import { requireApiKey, requireUserId } from "../lib/auth.js";
import type { MealPlanService } from "../lib/meal-plans.js";

export type V1RouterOptions = {
  service: MealPlanService;
  apiKey: string | undefined;
  defaultStore: string;
};

export function createV1Router({ service, apiKey, defaultStore }: V1RouterOptions): express.Router {
  const v1Router = express.Router();

  function parseGenerateQuery(req: Request) {
    return generatePlanQuerySchema.parse({
      store: req.query.store ?? defaultStore,
      days: req.query.days
    });
  }

  v1Router.get("/health", (_req, res) => {
    res.json({ ok: true, service: "mealgen-api", version: "v1" });
  });

  v1Router.use("/mealplans", requireApiKey(apiKey));

  v1Router.get("/mealplans", async (req, res) => {
    const userId = requireUserId(req, res);
    if (!userId) return;
    try {
      res.json(await service.list(userId));
    } catch (error) {
      sendDomainError(res, error);
    }
  });

  v1Router.post("/mealplans", async (req, res) => {
    const userId = requireUserId(req, res);
    if (!userId) return;
    try {
      const body = createMealPlanBodySchema.parse(req.body);
      res.status(201).json(await service.create(userId, body));
    } catch (error) {
      sendDomainError(res, error);
    }
  });

  // Registered before "/mealplans/:id" so "generate" is never read as an id.
  v1Router.post("/mealplans/generate", async (req, res) => {
    const userId = requireUserId(req, res);
    if (!userId) return;
    try {
      const { store, days } = parseGenerateQuery(req);
      res.status(201).json(await service.generate(userId, store, days));
    } catch (error) {
      sendDomainError(res, error);
    }
  });

  v1Router.post("/mealplans/generate-ai", async (req, res) => {
    const userId = requireUserId(req, res);
    if (!userId) return;
    try {
      const { store, days } = parseGenerateQuery(req);
      res.status(201).json(await service.generateAi(userId, store, days));
    } catch (error) {
      sendDomainError(res, error);
    }
  });

  async function withPlanId(req: Request, res: Response, handle: (userId: string, id: number) => Promise<void>) {
    const userId = requireUserId(req, res);
    if (!userId) return;
    try {
      await handle(userId, mealPlanIdParamSchema.parse(req.params.id));
    } catch (error) {
      sendDomainError(res, error);
    }
  }

  v1Router.get("/mealplans/:id", (req, res) =>
    withPlanId(req, res, async (userId, id) => {
      res.json(await service.get(userId, id));
    })
  );

  v1Router.delete("/mealplans/:id", (req, res) =>
    withPlanId(req, res, async (userId, id) => {
      await service.remove(userId, id);
      res.status(204).end();
    })
  );

  v1Router.get("/mealplans/:id/shopping-list", (req, res) =>
    withPlanId(req, res, async (userId, id) => {
      res.json(await service.shoppingList(userId, id));
    })
  );

  return v1Router;
}
