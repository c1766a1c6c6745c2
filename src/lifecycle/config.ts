import type { z } from "zod";
import { ComponentError } from "./errors.js";

/** Recursively freezes a resolved configuration object. */
function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Merge caller values over the schema's documented defaults, validate, freeze.
 * Invalid input is a CONFIGURATION error, raised before any remote call.
 */
export function resolveConfig<S extends z.ZodTypeAny>(
  component: string,
  schema: S,
  input: z.input<S>,
): Readonly<z.output<S>> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ComponentError(
      "CONFIGURATION",
      `Invalid ${component} configuration: ${issues}`,
      { component },
    );
  }
  return deepFreeze(parsed.data);
}
