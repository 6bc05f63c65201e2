import { z } from "zod";

// Unset and blank environment values both fall back to the default.
export const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

export const envInt = (fallback: number, min: number, max: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));

export const envString = (fallback: string) =>
  z.preprocess(blankToUndefined, z.string().min(1).default(fallback));
