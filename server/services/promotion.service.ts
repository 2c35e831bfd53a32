import type { Promotion } from "@shared/schema";
import { checkIdMatchesPath, validatePromotionInput } from "@shared/promotionValidation";
import { todayIsoDate, yesterdayIsoDate } from "@shared/date-utils";
import type { IStorage, PromotionFilter } from "../storage";
import type { PromotionQuery } from "../promotionFilters";
import { DataValidationError, NotFoundError } from "../errors";
import logger from "../logger";

export type PromotionServiceOptions = {
  storage: IStorage;
  /** IANA zone that decides what "today" is; the process zone when omitted. */
  timeZone?: string;
  now?: () => Date;
};

export function promotionNotFound(id: number | string): NotFoundError {
  return new NotFoundError(`Promotion with id '${id}' was not found.`);
}

export class PromotionService {
  private readonly storage: IStorage;
  private readonly timeZone?: string;
  private readonly now: () => Date;

  constructor(options: PromotionServiceOptions) {
    this.storage = options.storage;
    this.timeZone = options.timeZone;
    this.now = options.now ?? (() => new Date());
  }

  today(): string {
    return todayIsoDate(this.now(), this.timeZone);
  }

  yesterday(): string {
    return yesterdayIsoDate(this.now(), this.timeZone);
  }

  private toFilter(query: Exclude<PromotionQuery, { kind: "none" }>): PromotionFilter {
    return query.kind === "active" ? { ...query, on: this.today() } : query;
  }

  async list(query: PromotionQuery): Promise<Promotion[]> {
    if (query.kind === "none") {
      logger.info({ param: query.param }, "Promotion filter cannot match; returning no results");
      return [];
    }
    const filter = this.toFilter(query);
    logger.info({ filter }, "Listing promotions");
    return this.storage.listPromotions(filter);
  }

  async get(id: number): Promise<Promotion> {
    logger.info({ promotionId: id }, "Looking up promotion");
    const promotion = await this.storage.getPromotion(id);
    if (!promotion) throw promotionNotFound(id);
    return promotion;
  }

  async create(body: unknown): Promise<Promotion> {
    const result = validatePromotionInput(body);
    if (!result.success) {
      throw DataValidationError.fromValidation(result.error);
    }
    const promotion = await this.storage.createPromotion(result.data);
    logger.info({ promotionId: promotion.id, name: promotion.name }, "Created promotion");
    return promotion;
  }

  /** Full replace; the path id wins over anything in the body. */
  async update(id: number, body: unknown): Promise<Promotion> {
    await this.get(id);

    const mismatch = checkIdMatchesPath(body, id);
    if (mismatch) {
      throw DataValidationError.fromValidation(mismatch);
    }

    const result = validatePromotionInput(body);
    if (!result.success) {
      throw DataValidationError.fromValidation(result.error);
    }

    const updated = await this.storage.updatePromotion(id, result.data);
    if (!updated) throw promotionNotFound(id);
    logger.info({ promotionId: id }, "Updated promotion");
    return updated;
  }

  /** Ends the promotion yesterday unless it already ended earlier. */
  async deactivate(id: number): Promise<Promotion> {
    const cutoff = this.yesterday();
    const updated = await this.storage.deactivatePromotion(id, cutoff);
    if (!updated) throw promotionNotFound(id);
    logger.info({ promotionId: id, endDate: updated.endDate }, "Deactivated promotion");
    return updated;
  }

  async remove(id: number): Promise<void> {
    const deleted = await this.storage.deletePromotion(id);
    if (!deleted) throw promotionNotFound(id);
    logger.info({ promotionId: id }, "Deleted promotion");
  }
}
