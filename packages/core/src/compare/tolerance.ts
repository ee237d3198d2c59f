export interface ToleranceResult {
  status: "Success" | "Failed" | "Error";
  deltaPercent?: number;
  message: string;
}

export function formatPercent(value: number): string {
  const rounded = Math.round(value * 100) / 100;
  return `${rounded > 0 ? "+" : ""}${rounded}%`;
}

/**
 * Relative comparison: passes when |new - old| / |old| * 100 <= tolerance.
 * Undefined (Error) when old is 0 and the value moved.
 */
export function evaluateTolerance(
  oldValue: number,
  newValue: number,
  tolerancePercent: number
): ToleranceResult {
  if (!Number.isFinite(oldValue) || !Number.isFinite(newValue)) {
    return { status: "Error", message: `non-numeric values: ${oldValue} -> ${newValue}` };
  }
  if (oldValue === newValue) {
    return { status: "Success", deltaPercent: 0, message: `${oldValue} -> ${newValue} (0%)` };
  }
  if (oldValue === 0) {
    return {
      status: "Error",
      message: `${oldValue} -> ${newValue}: relative change is undefined for an old value of 0`,
    };
  }
  const deltaPercent = ((newValue - oldValue) / Math.abs(oldValue)) * 100;
  const passed = Math.abs(deltaPercent) <= tolerancePercent;
  return {
    status: passed ? "Success" : "Failed",
    deltaPercent,
    message: `${oldValue} -> ${newValue} (${formatPercent(deltaPercent)})`,
  };
}

/**
 * Boolean criterion. With changes disallowed any difference fails,
 * whichever direction it goes.
 */
export function evaluateAllowedChanges<T extends string | number | boolean>(
  oldValue: T,
  newValue: T,
  allowed: boolean
): ToleranceResult {
  const message = `${oldValue} -> ${newValue}`;
  if (allowed || oldValue === newValue) {
    return { status: "Success", message };
  }
  return { status: "Failed", message };
}
