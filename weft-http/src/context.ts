import type { Request, Response } from "express";
import type { ZodTypeAny, output } from "zod";
import { ValidationError, toUUID } from "@weft/sys";

const INT_MIN = -(2 ** 31);
const INT_MAX = 2 ** 31 - 1;

/**
 * First value of a query parameter, or null when absent
 */
export function queryParam(req: Request, name: string): string | null {
  const value: unknown = req.query[name];
  if (typeof value === "string") return value;
  if (Array.isArray(value) && typeof value[0] === "string") return value[0];
  return null;
}

/**
 * UUID path parameter. Throws ValidationError when it is not a UUID.
 */
export function idPathParam(req: Request, name = "id"): string {
  const id = toUUID(req.params[name]);
  if (!id) throw ValidationError.field(name, "must be a UUID");
  return id;
}

function integerQueryParam(req: Request, name: string, min: number, max: number): number | null {
  const value = queryParam(req, name);
  if (value === null) return null;

  const parsed = /^[-+]?\d+$/.test(value.trim()) ? Number(value) : Number.NaN;
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw ValidationError.field(name, "must be an integer");
  }
  return parsed;
}

export function intQueryParam(req: Request, name: string): number | null {
  return integerQueryParam(req, name, INT_MIN, INT_MAX);
}

export function longQueryParam(req: Request, name: string): number | null {
  return integerQueryParam(req, name, Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER);
}

/**
 * `YYYY-MM-DD` query parameter as a Date at UTC midnight
 */
export function dateQueryParam(req: Request, name: string): Date | null {
  const value = queryParam(req, name);
  if (value === null) return null;

  const date = new Date(`${value}T00:00:00.000Z`);
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value) || Number.isNaN(date.getTime()) || date.toISOString().slice(0, 10) !== value) {
    throw ValidationError.field(name, "must be a date (YYYY-MM-DD)");
  }
  return date;
}

/**
 * Respond with the value as JSON, or 404 when there is none
 */
export function jsonOr404(res: Response, value: unknown): void {
  if (value === null || value === undefined) {
    res.status(404).end();
  } else {
    res.json(value);
  }
}

/**
 * Parse the JSON body with a zod schema. Throws ValidationError on mismatch.
 */
export function bodyFromJson<S extends ZodTypeAny>(req: Request, schema: S): output<S> {
  const result = schema.safeParse(req.body);
  if (!result.success) throw ValidationError.fromZodError(result.error);
  return result.data;
}
