import { errorMessage } from "../../errors.js";
import type { HooksConfig } from "../../types.js";
import { satisfactionSurveyHook } from "./satisfaction-survey.js";
import type { PostRunHook, RunContext } from "./types.js";
import { webhookHook } from "./webhook.js";

export type { PostRunHook, RunContext } from "./types.js";
export { satisfactionSurveyHook, renderSurvey } from "./satisfaction-survey.js";
export { webhookHook } from "./webhook.js";

/** Hooks enabled by configuration; none by default. */
export function createHooks(config: HooksConfig): PostRunHook[] {
  const hooks: PostRunHook[] = [];
  if (config.satisfactionSurvey) hooks.push(satisfactionSurveyHook(config.satisfactionSurvey));
  if (config.webhook) hooks.push(webhookHook(config.webhook));
  return hooks;
}

/** Run hooks in order; a failing hook is logged and the rest still run. */
export async function runHooks(hooks: readonly PostRunHook[], context: RunContext): Promise<void> {
  for (const hook of hooks) {
    try {
      await hook.run(context);
    } catch (err: unknown) {
      context.log.warn(`Post-run hook '${hook.name}' failed: ${errorMessage(err)}`);
    }
  }
}
