import { errorMessage } from "../../errors.js";
import { hasAnyLabel } from "../../lifecycle/labels.js";
import type { EntitySnapshot, SatisfactionSurveyConfig } from "../../types.js";
import type { PostRunHook } from "./types.js";

export function renderSurvey(template: string, entity: Pick<EntitySnapshot, "id" | "title" | "url">): string {
  return template
    .replace(/\{\{id\}\}/g, String(entity.id))
    .replace(/\{\{title\}\}/g, entity.title ?? "")
    .replace(/\{\{url\}\}/g, entity.url ?? "");
}

/**
 * Asks the authors of issues closed by this run whether they were satisfied
 * with the outcome. Pull requests are never surveyed.
 */
export function satisfactionSurveyHook(config: SatisfactionSurveyConfig): PostRunHook {
  return {
    name: "satisfactionSurvey",
    async run({ tracker, entities, result, dryRun, log }) {
      if (dryRun) return;

      const byId = new Map(entities.map((e) => [e.id, e]));
      let posted = 0;

      for (const op of result.applied) {
        if (op.kind !== "close" || op.entityKind !== "issue") continue;
        const entity = byId.get(op.entityId);
        if (!entity) continue;
        if (config.labels.length > 0 && !hasAnyLabel(entity.labels, config.labels)) continue;

        try {
          await tracker.postComment(entity, renderSurvey(config.message, entity));
          posted++;
        } catch (err: unknown) {
          log.warn(`Survey comment on issue #${entity.id} failed: ${errorMessage(err)}`);
        }
      }

      if (posted > 0) log.info(`Posted ${posted} satisfaction survey(s)`);
    },
  };
}
