import type { RawOutcome } from "../../../src/compare/types.js";

export function compareArtifacts(): RawOutcome {
  return { status: "Success", itemName: "custom_check", detail: "matched" };
}

export async function compareLogs(): Promise<RawOutcome> {
  return [];
}
