import type { ItemTemplate } from "./types.js";

export const DEFAULT_ITEM_TEMPLATES: readonly ItemTemplate[] = [
  { phase: "Execution", item: "launch", successMemo: "exited normally", failureMemo: "abnormal exit", linkType: "log" },
  { phase: "Artifact", item: "format_check", successMemo: "no format change", failureMemo: "format changed", linkType: "new_artifact" },
  { phase: "Artifact", item: "line_count", successMemo: "line count unchanged", failureMemo: "line count changed", linkType: "new_artifact" },
  { phase: "Artifact", item: "content_diff", successMemo: "identical content", failureMemo: "content differs", linkType: "compare_artifacts" },
  { phase: "Artifact", item: "keyword_check", successMemo: "all markers present", failureMemo: "markers disappeared", linkType: "new_artifact" },
  { phase: "Artifact", item: "custom_patterns", successMemo: "within tolerance", failureMemo: "out of tolerance", linkType: "compare_artifacts" },
  { phase: "Log", item: "error_scan", successMemo: "no new warnings or errors", failureMemo: "new warnings or errors", linkType: "log" },
  { phase: "Log", item: "content_diff", successMemo: "identical log", failureMemo: "log differs", linkType: "diff" },
  { phase: "Summary", item: "compatibility", successMemo: "safe to migrate", failureMemo: "action required", linkType: "report" },
];

/**
 * Read-only lookup of item templates per tool. Keys are matched on the
 * lowercased tool name; tools without an entry get the default list.
 */
export class ItemTemplateCatalog {
  private readonly entries: ReadonlyMap<string, readonly ItemTemplate[]>;
  private readonly fallback: readonly ItemTemplate[];

  constructor(
    toolItems: Record<string, readonly ItemTemplate[]> = {},
    fallback: readonly ItemTemplate[] = DEFAULT_ITEM_TEMPLATES
  ) {
    const entries = new Map<string, readonly ItemTemplate[]>();
    for (const [tool, templates] of Object.entries(toolItems)) {
      entries.set(tool.toLowerCase(), Object.freeze([...templates]));
    }
    this.entries = entries;
    this.fallback = fallback;
  }

  forTool(tool: string): readonly ItemTemplate[] {
    return this.entries.get(tool.toLowerCase()) ?? this.fallback;
  }

  has(tool: string): boolean {
    return this.entries.has(tool.toLowerCase());
  }
}
