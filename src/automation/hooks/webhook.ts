import { sendWebhookPayload } from "../../reporting/run-report.js";
import type { WebhookConfig } from "../../types.js";
import type { PostRunHook } from "./types.js";

/** Sends each repository's run report to an HTTP endpoint. */
export function webhookHook(config: WebhookConfig): PostRunHook {
  return {
    name: "webhook",
    async run({ report, dryRun, log }) {
      await sendWebhookPayload({ ...report, dryRun }, config, log);
    },
  };
}
