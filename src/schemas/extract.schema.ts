// src/schemas/extract.schema.ts
import { z } from "zod";

export const ParseBody = z.object({
  text: z.string().trim().min(1, "Please enter an event description."),
});

export type ParseBody = z.infer<typeof ParseBody>;
