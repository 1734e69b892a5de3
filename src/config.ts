import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { InvalidConfigError, errorMessage } from "./errors.js";
import { policyProblems } from "./lifecycle/validate.js";
import { parseLabelList } from "./lifecycle/labels.js";
import { parseRepositoryUrl } from "./repo-url.js";
import type {
  CloseReason,
  HooksConfig,
  PolicyConfig,
  RepositoryTarget,
  SatisfactionSurveyConfig,
  WebhookConfig,
} from "./types.js";
import {
  CLOSE_REASONS,
  DEFAULT_CLOSE_REASON,
  DEFAULT_DAYS_BEFORE_CLOSE,
  DEFAULT_DAYS_BEFORE_STALE,
  DEFAULT_OPERATIONS_PER_RUN,
  DEFAULT_STALE_LABEL,
} from "./types.js";

export const DEFAULT_CONFIG_FILE = "stale-config.json";

/** Policy keys as written in the config file. All optional; see resolvePolicy for defaults. */
export interface PolicyOptions {
  daysBeforeStale?: number;
  daysBeforeClose?: number;
  daysBeforeIssueStale?: number;
  daysBeforeIssueClose?: number;
  daysBeforePrStale?: number;
  daysBeforePrClose?: number;
  exemptIssueLabels?: string | string[];
  exemptPrLabels?: string | string[];
  anyOfLabels?: string | string[];
  staleIssueLabel?: string;
  stalePrLabel?: string;
  staleIssueMessage?: string;
  stalePrMessage?: string;
  closeIssueMessage?: string;
  closePrMessage?: string;
  closeIssueLabel?: string;
  closePrLabel?: string;
  closeIssueReason?: CloseReason;
  removeStaleWhenUpdated?: boolean;
  exemptDraftPr?: boolean;
  operationsPerRun?: number;
  ascending?: boolean;
}

export interface RepositorySettings {
  url: string;
  target: RepositoryTarget;
  policy: PolicyConfig;
  /** Process the oldest entities first. */
  ascending: boolean;
}

export interface SweepConfig {
  repositories: RepositorySettings[];
  hooks: HooksConfig;
}

const NUMBER_KEYS = [
  "daysBeforeStale",
  "daysBeforeClose",
  "daysBeforeIssueStale",
  "daysBeforeIssueClose",
  "daysBeforePrStale",
  "daysBeforePrClose",
  "operationsPerRun",
] as const;

const STRING_KEYS = [
  "staleIssueLabel",
  "stalePrLabel",
  "staleIssueMessage",
  "stalePrMessage",
  "closeIssueMessage",
  "closePrMessage",
  "closeIssueLabel",
  "closePrLabel",
] as const;

const LABEL_LIST_KEYS = ["exemptIssueLabels", "exemptPrLabels", "anyOfLabels"] as const;

const BOOLEAN_KEYS = ["removeStaleWhenUpdated", "exemptDraftPr", "ascending"] as const;

const KNOWN_KEYS = new Set<string>([
  ...NUMBER_KEYS,
  ...STRING_KEYS,
  ...LABEL_LIST_KEYS,
  ...BOOLEAN_KEYS,
  "closeIssueReason",
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCloseReason(value: unknown): value is CloseReason {
  return typeof value === "string" && CLOSE_REASONS.some((r) => r === value);
}

/** `days-before-stale` and `days_before_stale` are accepted as `daysBeforeStale`. */
export function normalizeKey(key: string): string {
  return key.replace(/[-_]+([a-zA-Z0-9])/g, (_m, c: string) => c.toUpperCase());
}

/**
 * Read policy keys from a parsed JSON object. Problems are collected rather
 * than thrown so one run reports every mistake in the file.
 */
export function parsePolicyOptions(value: unknown, where: string, problems: string[]): PolicyOptions {
  const options: PolicyOptions = {};
  if (value === undefined) return options;
  if (!isRecord(value)) {
    problems.push(`${where} must be an object`);
    return options;
  }

  const entries = new Map<string, unknown>();
  for (const [rawKey, v] of Object.entries(value)) {
    const key = normalizeKey(rawKey);
    if (!KNOWN_KEYS.has(key)) {
      problems.push(`${where}: unknown option '${rawKey}'`);
      continue;
    }
    entries.set(key, v);
  }

  for (const key of NUMBER_KEYS) {
    const v = entries.get(key);
    if (v === undefined) continue;
    if (typeof v === "number") options[key] = v;
    else problems.push(`${where}.${key} must be a number`);
  }

  for (const key of STRING_KEYS) {
    const v = entries.get(key);
    if (v === undefined) continue;
    if (typeof v === "string") options[key] = v;
    else problems.push(`${where}.${key} must be a string`);
  }

  for (const key of LABEL_LIST_KEYS) {
    const v = entries.get(key);
    if (v === undefined) continue;
    if (typeof v === "string") {
      options[key] = v;
    } else if (Array.isArray(v) && v.every((item): item is string => typeof item === "string")) {
      options[key] = v;
    } else {
      problems.push(`${where}.${key} must be a string or an array of strings`);
    }
  }

  for (const key of BOOLEAN_KEYS) {
    const v = entries.get(key);
    if (v === undefined) continue;
    if (typeof v === "boolean") options[key] = v;
    else problems.push(`${where}.${key} must be a boolean`);
  }

  const reason = entries.get("closeIssueReason");
  if (reason !== undefined) {
    if (isCloseReason(reason)) options.closeIssueReason = reason;
    else problems.push(`${where}.closeIssueReason must be one of ${CLOSE_REASONS.join(", ")}`);
  }

  return options;
}

export function resolvePolicy(options: PolicyOptions = {}): PolicyConfig {
  const daysBeforeStale = options.daysBeforeStale ?? DEFAULT_DAYS_BEFORE_STALE;
  const daysBeforeClose = options.daysBeforeClose ?? DEFAULT_DAYS_BEFORE_CLOSE;

  return {
    perKind: {
      issue: {
        daysBeforeStale: options.daysBeforeIssueStale ?? daysBeforeStale,
        daysBeforeClose: options.daysBeforeIssueClose ?? daysBeforeClose,
        exemptLabels: parseLabelList(options.exemptIssueLabels ?? []),
        staleLabel: options.staleIssueLabel ?? DEFAULT_STALE_LABEL,
        staleMessage: options.staleIssueMessage ?? "",
        closeMessage: options.closeIssueMessage ?? "",
        closeLabel: options.closeIssueLabel || undefined,
      },
      pull_request: {
        daysBeforeStale: options.daysBeforePrStale ?? daysBeforeStale,
        daysBeforeClose: options.daysBeforePrClose ?? daysBeforeClose,
        exemptLabels: parseLabelList(options.exemptPrLabels ?? []),
        staleLabel: options.stalePrLabel ?? DEFAULT_STALE_LABEL,
        staleMessage: options.stalePrMessage ?? "",
        closeMessage: options.closePrMessage ?? "",
        closeLabel: options.closePrLabel || undefined,
      },
    },
    requiredAnyLabels: parseLabelList(options.anyOfLabels ?? []),
    closeIssueReason: options.closeIssueReason ?? DEFAULT_CLOSE_REASON,
    removeStaleWhenUpdated: options.removeStaleWhenUpdated ?? true,
    exemptDraftPr: options.exemptDraftPr ?? false,
    maxOperationsPerRun: options.operationsPerRun ?? DEFAULT_OPERATIONS_PER_RUN,
  };
}

function parseWebhook(value: unknown, problems: string[]): WebhookConfig | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value) || typeof value.url !== "string" || value.url === "") {
    problems.push("hooks.webhook must be an object with a 'url' string");
    return undefined;
  }
  const webhook: WebhookConfig = { url: value.url };
  if (value.method !== undefined) {
    if (value.method === "POST" || value.method === "PUT") webhook.method = value.method;
    else problems.push("hooks.webhook.method must be POST or PUT");
  }
  if (value.headers !== undefined) {
    const headers = value.headers;
    if (isRecord(headers) && Object.values(headers).every((h) => typeof h === "string")) {
      webhook.headers = Object.fromEntries(
        Object.entries(headers).map(([k, h]) => [k, String(h)]),
      );
    } else {
      problems.push("hooks.webhook.headers must map header names to strings");
    }
  }
  return webhook;
}

function parseSurvey(value: unknown, problems: string[]): SatisfactionSurveyConfig | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value) || typeof value.message !== "string" || value.message.trim() === "") {
    problems.push("hooks.satisfactionSurvey must be an object with a non-empty 'message'");
    return undefined;
  }
  const labels = value.labels;
  if (labels === undefined) return { message: value.message, labels: [] };
  if (typeof labels === "string") return { message: value.message, labels: parseLabelList(labels) };
  if (Array.isArray(labels) && labels.every((l): l is string => typeof l === "string")) {
    return { message: value.message, labels: parseLabelList(labels) };
  }
  problems.push("hooks.satisfactionSurvey.labels must be a string or an array of strings");
  return undefined;
}

function parseHooks(value: unknown, problems: string[]): HooksConfig {
  if (value === undefined) return {};
  if (!isRecord(value)) {
    problems.push("hooks must be an object");
    return {};
  }
  return {
    webhook: parseWebhook(value.webhook, problems),
    satisfactionSurvey: parseSurvey(value.satisfactionSurvey, problems),
  };
}

/**
 * Validate a parsed config file. Every policy is resolved and checked here,
 * so a bad threshold aborts the run before any repository is touched.
 */
export function parseSweepConfig(raw: unknown, source = DEFAULT_CONFIG_FILE): SweepConfig {
  const problems: string[] = [];
  if (!isRecord(raw)) {
    throw new InvalidConfigError(["config must be a JSON object"], source);
  }

  const shared = parsePolicyOptions(raw.policy, "policy", problems);

  const repositories: RepositorySettings[] = [];
  if (!Array.isArray(raw.repositories) || raw.repositories.length === 0) {
    problems.push("'repositories' must be a non-empty array of objects with a 'url' field");
  } else {
    raw.repositories.forEach((entry: unknown, i: number) => {
      const where = `repositories[${i}]`;
      if (!isRecord(entry) || typeof entry.url !== "string") {
        problems.push(`${where} must be an object with a 'url' string`);
        return;
      }
      const target = parseRepositoryUrl(entry.url);
      if (!target) {
        problems.push(`${where}: unsupported repository URL ${entry.url}`);
        return;
      }
      const options = { ...shared, ...parsePolicyOptions(entry.policy, `${where}.policy`, problems) };
      const policy = resolvePolicy(options);
      for (const p of policyProblems(policy)) {
        problems.push(`${where} (${entry.url}): ${p}`);
      }
      repositories.push({ url: entry.url, target, policy, ascending: options.ascending ?? false });
    });
  }

  const hooks = parseHooks(raw.hooks, problems);

  if (problems.length > 0) {
    throw new InvalidConfigError(problems, source);
  }
  return { repositories, hooks };
}

export function loadSweepConfig(configFilePath?: string): SweepConfig {
  const configPath = resolve(configFilePath ?? DEFAULT_CONFIG_FILE);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (err: unknown) {
    throw new InvalidConfigError([`cannot read ${configPath}: ${errorMessage(err)}`]);
  }

  return parseSweepConfig(raw, configPath);
}
