import { z } from "zod";
import { TaskInputError } from "../domain/errors";
import { PROVIDER_IDS } from "../domain/types";

export const providerSchema = z.string().trim().toLowerCase().pipe(z.enum(PROVIDER_IDS));

/** Parses caller input, reporting schema violations as TaskInputError. */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`);
    throw new TaskInputError(`Invalid input: ${details.join("; ")}`);
  }
  return parsed.data;
}
