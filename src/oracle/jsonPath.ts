import { OracleError } from "../errors";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Walks a dot separated path ("data.amount") into a parsed JSON document.
 * Every segment must name a key of an object.
 */
export function readJsonPath(document: unknown, dotPath: string): unknown {
  let current = document;
  for (const key of dotPath.split(".")) {
    if (!isRecord(current)) {
      throw new OracleError(`'${key}' is not an object`, "ParseError", { key });
    }
    if (!Object.prototype.hasOwnProperty.call(current, key)) {
      throw new OracleError(`Key '${key}' not found`, "ParseError", { key });
    }
    current = current[key];
  }
  return current;
}

/** Numeric leaf as a finite number; numeric strings are accepted. */
export function numericLeaf(value: unknown): number {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  throw new OracleError(`price is not a number: ${JSON.stringify(value)}`, "ParseError");
}
