import type { Express, NextFunction, Request, Response } from "express";
import { serializePromotion } from "@shared/schema";
import { promotionNotFound, type PromotionService } from "../services/promotion.service";
import { fitsIntegerColumn, parseInteger, resolvePromotionQuery } from "../promotionFilters";
import { methodNotAllowed, requireContentType } from "../middleware/http";
import { setLogContext } from "../logger";

// Path ids are digits only; anything else falls through to the 404 handler
const ID_PATTERN = "(\\d+)";

// Ids beyond the integer column cannot exist, so they never reach storage
function pathId(req: Request): number {
  const id = parseInteger(req.params.id);
  if (id === null || !fitsIntegerColumn(id)) {
    throw promotionNotFound(req.params.id);
  }
  setLogContext({ promotionId: id });
  return id;
}

function promotionLocation(req: Request, id: number): string {
  return `${req.protocol}://${req.get("host")}/promotions/${id}`;
}

export function registerPromotionRoutes(app: Express, service: PromotionService) {
  const requireJson = requireContentType("application/json");

  /**
   * @openapi
   * /promotions:
   *   get:
   *     summary: List promotions
   *     description: >
   *       Applies only the first filter present, in the order id, active,
   *       name, product_id, promotion_type. An empty id, active, name or
   *       product_id is ignored; an empty promotion_type matches nothing.
   *       Without filters every promotion is returned.
   *     parameters:
   *       - in: query
   *         name: id
   *         schema:
   *           type: integer
   *       - in: query
   *         name: active
   *         schema:
   *           type: string
   *           enum: ["true", "false", "1", "0", "yes", "no"]
   *       - in: query
   *         name: name
   *         description: Exact match after trimming surrounding whitespace
   *         schema:
   *           type: string
   *       - in: query
   *         name: product_id
   *         schema:
   *           type: integer
   *       - in: query
   *         name: promotion_type
   *         schema:
   *           type: string
   *           enum: [BOGO, DISCOUNT, PERCENT]
   *     responses:
   *       200:
   *         description: List of promotions
   *       400:
   *         description: Invalid active or product_id value
   */
  app.get("/promotions", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = resolvePromotionQuery(req.query);
      const promotions = await service.list(query);
      res.status(200).json(promotions.map(serializePromotion));
    } catch (error) {
      next(error);
    }
  });

  /**
   * @openapi
   * /promotions:
   *   post:
   *     summary: Create a promotion
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [name, promotion_type, value, product_id, start_date, end_date]
   *             properties:
   *               name:
   *                 type: string
   *                 maxLength: 63
   *               promotion_type:
   *                 type: string
   *                 enum: [BOGO, DISCOUNT, PERCENT]
   *               value:
   *                 type: integer
   *                 minimum: 0
   *               product_id:
   *                 type: integer
   *                 minimum: 1
   *               start_date:
   *                 type: string
   *                 format: date
   *               end_date:
   *                 type: string
   *                 format: date
   *     responses:
   *       201:
   *         description: Promotion created; Location points at the new resource
   *       400:
   *         description: Invalid input
   *       415:
   *         description: Body is not application/json
   */
  app.post("/promotions", requireJson, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const promotion = await service.create(req.body);
      res
        .status(201)
        .location(promotionLocation(req, promotion.id))
        .json(serializePromotion(promotion));
    } catch (error) {
      next(error);
    }
  });

  app.all("/promotions", methodNotAllowed(["GET", "POST"]));

  /**
   * @openapi
   * /promotions/{id}:
   *   get:
   *     summary: Get a promotion
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: The promotion
   *       404:
   *         description: Promotion not found
   */
  app.get(`/promotions/:id${ID_PATTERN}`, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const promotion = await service.get(pathId(req));
      res.status(200).json(serializePromotion(promotion));
    } catch (error) {
      next(error);
    }
  });

  /**
   * @openapi
   * /promotions/{id}:
   *   put:
   *     summary: Replace a promotion
   *     description: Full update. An id in the body must equal the path id.
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Promotion updated
   *       400:
   *         description: Invalid input or id mismatch
   *       404:
   *         description: Promotion not found
   *       415:
   *         description: Body is not application/json
   */
  app.put(
    `/promotions/:id${ID_PATTERN}`,
    requireJson,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const promotion = await service.update(pathId(req), req.body);
        res.status(200).json(serializePromotion(promotion));
      } catch (error) {
        next(error);
      }
    },
  );

  /**
   * @openapi
   * /promotions/{id}:
   *   delete:
   *     summary: Delete a promotion
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       204:
   *         description: Promotion deleted
   *       404:
   *         description: Promotion not found
   */
  app.delete(
    `/promotions/:id${ID_PATTERN}`,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        await service.remove(pathId(req));
        res.status(204).end();
      } catch (error) {
        next(error);
      }
    },
  );

  app.all(`/promotions/:id${ID_PATTERN}`, methodNotAllowed(["GET", "PUT", "DELETE"]));

  /**
   * @openapi
   * /promotions/{id}/deactivate:
   *   put:
   *     summary: Deactivate a promotion
   *     description: >
   *       Moves end_date back to yesterday. A promotion that already ended
   *       earlier keeps its end_date.
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Promotion deactivated
   *       404:
   *         description: Promotion not found
   */
  app.put(
    `/promotions/:id${ID_PATTERN}/deactivate`,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const promotion = await service.deactivate(pathId(req));
        res.status(200).json(serializePromotion(promotion));
      } catch (error) {
        next(error);
      }
    },
  );

  app.all(`/promotions/:id${ID_PATTERN}/deactivate`, methodNotAllowed(["PUT"]));
}
