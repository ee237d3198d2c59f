import type { RawOutcome } from "../../../src/compare/types.js";

export const comparator = {
  compareArtifacts(): RawOutcome {
    return [false, "outputs differ", "--- old\n+++ new\n-a\n+b\n"];
  },
  compareLogs(): RawOutcome {
    return [true, "logs match", "no new warnings"];
  },
};
