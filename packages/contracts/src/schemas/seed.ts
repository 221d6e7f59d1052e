import { z } from "zod";
import { UINT32_MAX } from "../constants";

export const SeedSchema = z
  .number()
  .int({ error: "Seed must be an integer" })
  .min(0, { error: "Seed must be non-negative" })
  .max(UINT32_MAX, { error: "Seed must fit in uint32" });
