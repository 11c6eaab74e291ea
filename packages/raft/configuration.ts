import { z } from "zod";
import type { InterchangeObject } from "./custom-command";

export type InstanceId = number;
export type Configuration = ReadonlySet<InstanceId>;

export const instanceIdSchema = z
  .number()
  .int()
  .nonnegative()
  .max(Number.MAX_SAFE_INTEGER);

const encodedConfigurationSchema = z
  .object({
    instanceIds: z.array(z.unknown()).catch([]),
  })
  .catch({ instanceIds: [] });

export const toConfiguration = (instanceIds: Iterable<InstanceId>): Configuration => {
  const configuration = new Set<InstanceId>();
  for (const id of instanceIds) {
    if (!instanceIdSchema.safeParse(id).success) {
      throw new RangeError(`Invalid instance id: ${id}`);
    }
    configuration.add(id);
  }
  return configuration;
}

export const sortInstanceIds = (configuration: Configuration): InstanceId[] => {
  return Array.from(configuration).sort((a, b) => a - b);
}

export const encodeConfiguration = (configuration: Configuration): InterchangeObject => {
  return {
    instanceIds: sortInstanceIds(configuration)
  }
}

/**
 * Reads `{ instanceIds: [...] }`. Anything missing or malformed reads as no
 * members, and ids that are not unsigned integers are skipped.
 */
export const decodeConfiguration = (value: unknown): Configuration => {
  const { instanceIds } = encodedConfigurationSchema.parse(value);
  const configuration = new Set<InstanceId>();
  for (const id of instanceIds) {
    const parsed = instanceIdSchema.safeParse(id);
    if (parsed.success) {
      configuration.add(parsed.data);
    }
  }
  return configuration;
}

export const configurationEquals = (a: Configuration, b: Configuration): boolean => {
  if (a.size !== b.size) {
    return false;
  }
  for (const id of a) {
    if (!b.has(id)) {
      return false;
    }
  }
  return true;
}

export const formatConfiguration = (configuration: Configuration): string => {
  return `{${sortInstanceIds(configuration).join(", ")}}`;
}
