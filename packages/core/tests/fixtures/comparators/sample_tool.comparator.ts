import type { Comparator, ComparatorContext, RawOutcome } from "../../../src/compare/types.js";

export default class SampleToolComparator implements Comparator {
  private readonly context: ComparatorContext;

  constructor(context: ComparatorContext) {
    this.context = context;
  }

  compareArtifacts(): RawOutcome {
    const { toolName, oldVersion, newVersion } = this.context;
    return [false, `${toolName} ${oldVersion} -> ${newVersion}: outputs differ`];
  }

  compareLogs(): RawOutcome {
    return true;
  }
}
