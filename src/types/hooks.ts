export interface WebhookConfig {
  url: string;
  headers?: Record<string, string>;
  method?: "POST" | "PUT";
}

export interface SatisfactionSurveyConfig {
  /** Supports {{id}}, {{title}} and {{url}} placeholders. */
  message: string;
  /** When non-empty, only closed issues carrying one of these labels are surveyed. */
  labels: string[];
}

export interface HooksConfig {
  webhook?: WebhookConfig;
  satisfactionSurvey?: SatisfactionSurveyConfig;
}
