import { z } from "zod";

export const BuildCommandSchema = z.union([
  z.string(),
  z.array(z.string()),
]);

export const ConfigSchema = z
  .object({
    port: z.number().int().min(0).max(65535).optional(),
    host: z.string().min(1).optional(),
    serve: z.string().min(1).optional(),
    watch: z.string().min(1).optional(),
    ignore: z.array(z.string().min(1)).optional(),
    command: BuildCommandSchema.optional(),
    failure_status: z.number().int().min(200).max(599).optional(),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;
export type BuildCommandInput = z.infer<typeof BuildCommandSchema>;
