import type { ComparisonOutcome } from "../compare/types.js";
import { DEFAULT_ITEM_TEMPLATES, type ItemTemplateCatalog } from "./templates.js";
import type { ItemStatus, ItemTemplate, LinkType, Phase, VerificationItem } from "./types.js";

export interface ExecutionOutcome {
  status: "Success" | "Error";
  detail?: string;
  exitCode?: number;
}

export interface PhaseOutcomes {
  execution: { old: ExecutionOutcome; new: ExecutionOutcome };
  artifacts: ComparisonOutcome[];
  logs: ComparisonOutcome[];
}

export interface EvidenceLinks {
  oldArtifact?: string;
  newArtifact?: string;
  oldLog?: string;
  newLog?: string;
  report?: string;
}

export interface BuildReportInput {
  tool: string;
  oldVersion: string;
  newVersion: string;
  phaseOutcomes: PhaseOutcomes;
  templates: ItemTemplateCatalog;
  links?: EvidenceLinks;
  clock?: () => Date;
}

export interface Placed {
  outcome: ComparisonOutcome;
  template?: ItemTemplate;
}

/** Returns ISO timestamps that never go backwards, even if the clock does. */
export function createStamper(clock: () => Date = () => new Date()): () => string {
  let last = 0;
  return () => {
    last = Math.max(last, clock().getTime());
    return new Date(last).toISOString();
  };
}

/**
 * Merges execution, artifact and log outcomes into the ordered item list for
 * one tool run and appends exactly one Summary item.
 */
export function buildReportItems(input: BuildReportInput): VerificationItem[] {
  const { tool, oldVersion, newVersion, phaseOutcomes } = input;
  const links = input.links ?? {};
  const templates = input.templates.forTool(tool);
  const stamp = createStamper(input.clock);
  const items: VerificationItem[] = [];

  const launch = firstOf(templates, "Execution");
  for (const [version, execution, log] of [
    [oldVersion, phaseOutcomes.execution.old, links.oldLog],
    [newVersion, phaseOutcomes.execution.new, links.newLog],
  ] as const) {
    items.push(
      freeze({
        phase: "Execution",
        itemName: `${launch.item} (${version})`,
        status: execution.status,
        memo: execution.detail || (execution.status === "Success" ? launch.successMemo : launch.failureMemo),
        metric: execution.exitCode !== undefined ? `exit code: ${execution.exitCode}` : undefined,
        evidenceLink: log,
        timestamp: stamp(),
      })
    );
  }

  for (const [phase, outcomes] of [
    ["Artifact", phaseOutcomes.artifacts],
    ["Log", phaseOutcomes.logs],
  ] as const) {
    const placed = arrange(
      outcomes,
      templates.filter((t) => t.phase === phase)
    );
    placed.forEach((p, index) => items.push(toItem(phase, p, index, links, stamp)));
  }

  items.push(summaryItem(items, firstOf(templates, "Summary"), links, stamp));
  return items;
}

/** The single item published when a tool run cannot complete. */
export function fatalItem(message: string, clock?: () => Date): VerificationItem {
  return freeze({
    phase: "Summary",
    itemName: firstOf(DEFAULT_ITEM_TEMPLATES, "Summary").item,
    status: "Error",
    memo: message,
    timestamp: createStamper(clock)(),
  });
}

/**
 * Error outranks Failed, Failed outranks Success; NotApplicable items do not
 * count. When every artifact and log item is NotApplicable the run itself is.
 */
export function summarizeStatus(items: readonly VerificationItem[]): ItemStatus {
  const counted = items.filter((i) => i.phase !== "Summary" && i.status !== "NotApplicable");
  if (counted.some((i) => i.status === "Error")) return "Error";
  if (counted.some((i) => i.status === "Failed")) return "Failed";
  const comparisons = items.filter((i) => i.phase === "Artifact" || i.phase === "Log");
  if (comparisons.length > 0 && comparisons.every((i) => i.status === "NotApplicable")) {
    return "NotApplicable";
  }
  return "Success";
}

function summaryItem(
  items: readonly VerificationItem[],
  template: ItemTemplate,
  links: EvidenceLinks,
  stamp: () => string
): VerificationItem {
  const status = summarizeStatus(items);
  const failed = items.filter((i) => i.status === "Failed").length;
  const errors = items.filter((i) => i.status === "Error").length;

  let memo: string;
  switch (status) {
    case "Success":
      memo = template.successMemo;
      break;
    case "Failed":
      memo = `${template.failureMemo} (${failed} failed)`;
      break;
    case "Error":
      memo = `${template.failureMemo} (${errors} error${errors === 1 ? "" : "s"}, ${failed} failed)`;
      break;
    case "NotApplicable":
      memo = "no artifacts or logs to compare";
      break;
  }

  return freeze({
    phase: "Summary",
    itemName: template.item,
    status,
    memo,
    metric: "all checks combined",
    evidenceLink: linkFor(template.linkType, links),
    timestamp: stamp(),
  });
}

/**
 * Orders outcomes by the template they belong to. Named outcomes match a
 * template by item name or check; unnamed ones take the next free template;
 * anything left over follows in emission order.
 */
export function arrange(outcomes: readonly ComparisonOutcome[], templates: readonly ItemTemplate[]): Placed[] {
  const slots: Placed[][] = templates.map(() => []);
  const leftovers: Placed[] = [];
  const unnamed: ComparisonOutcome[] = [];

  for (const outcome of outcomes) {
    if (outcome.itemName === undefined && outcome.check === undefined) {
      unnamed.push(outcome);
      continue;
    }
    let index = templates.findIndex((t) => t.item === outcome.itemName);
    if (index === -1) index = templates.findIndex((t) => t.item === outcome.check);
    if (index === -1) {
      leftovers.push({ outcome });
    } else {
      slots[index].push({ outcome, template: templates[index] });
    }
  }

  let cursor = 0;
  for (const outcome of unnamed) {
    while (cursor < templates.length && slots[cursor].length > 0) cursor++;
    if (cursor < templates.length) {
      slots[cursor].push({ outcome, template: templates[cursor] });
      cursor++;
    } else {
      leftovers.push({ outcome });
    }
  }

  return [...slots.flat(), ...leftovers];
}

function toItem(
  phase: Phase,
  { outcome, template }: Placed,
  index: number,
  links: EvidenceLinks,
  stamp: () => string
): VerificationItem {
  return freeze({
    phase,
    itemName: outcome.itemName ?? template?.item ?? `${phase.toLowerCase()}_check_${index + 1}`,
    status: outcome.status,
    memo: memoFor(outcome, template),
    metric: outcome.status === "NotApplicable" ? undefined : outcome.metric,
    evidenceLink:
      outcome.evidencePath ?? outcome.logDiffPath ?? (template ? linkFor(template.linkType, links) : undefined),
    content: outcome.content,
    timestamp: stamp(),
  });
}

function memoFor(outcome: ComparisonOutcome, template: ItemTemplate | undefined): string {
  if (outcome.detail) return outcome.detail;
  switch (outcome.status) {
    case "Success":
      return template?.successMemo ?? "passed";
    case "Failed":
      return template?.failureMemo ?? "failed";
    case "Error":
      return "error";
    case "NotApplicable":
      return "not applicable";
  }
}

function linkFor(type: LinkType, links: EvidenceLinks): string | undefined {
  switch (type) {
    case "log":
      return links.newLog ?? links.oldLog;
    case "new_artifact":
      return links.newArtifact;
    case "compare_artifacts":
      return links.oldArtifact && links.newArtifact
        ? `${links.oldArtifact} -> ${links.newArtifact}`
        : undefined;
    case "diff":
      return undefined;
    case "report":
      return links.report;
  }
}

function firstOf(templates: readonly ItemTemplate[], phase: Phase): ItemTemplate {
  const found = templates.find((t) => t.phase === phase) ?? DEFAULT_ITEM_TEMPLATES.find((t) => t.phase === phase);
  if (!found) throw new Error(`No ${phase} item template defined`);
  return found;
}

function freeze(item: VerificationItem): VerificationItem {
  const copy: { -readonly [K in keyof VerificationItem]: VerificationItem[K] } = { ...item };
  if (copy.metric === undefined) delete copy.metric;
  if (copy.evidenceLink === undefined) delete copy.evidenceLink;
  if (copy.content === undefined) delete copy.content;
  return Object.freeze(copy);
}
