export type LogCategory = "http" | "storage" | "service" | "script";

export type LogContext = {
  category?: LogCategory;
  requestId?: string;
  method?: string;
  path?: string;
  promotionId?: number;
};
