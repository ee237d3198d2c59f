export class ConfigLoadError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to load ${path}: ${message}`, options);
    this.name = "ConfigLoadError";
    this.path = path;
  }
}

export class ComparatorLoadError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to load comparator ${path}: ${message}`, options);
    this.name = "ComparatorLoadError";
    this.path = path;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Reads a property off a thrown value without assuming its shape. */
export function errorProperty(e: unknown, key: string): unknown {
  return typeof e === "object" && e !== null && key in e ? Reflect.get(e, key) : undefined;
}
