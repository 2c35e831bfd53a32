import type { Express } from "express";
import type { PromotionService } from "../services/promotion.service";
import { registerPromotionRoutes } from "./promotions";

export function registerRoutes(app: Express, service: PromotionService): void {
  registerPromotionRoutes(app, service);
}
