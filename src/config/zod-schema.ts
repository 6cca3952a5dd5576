import { z } from "zod";

export const AdvisorSchema = z
  .object({
    model: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    maxTokens: z.number().int().positive().optional(),
    temperature: z.number().min(0).max(2).optional(),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict()
  .optional();

export const ReportSchema = z
  .object({
    organization: z.string().min(1).optional(),
    massUnit: z.enum(["auto", "kg", "t"]).optional(),
  })
  .strict()
  .optional();

export const ScopeLedgerConfigSchema = z
  .object({
    advisor: AdvisorSchema,
    report: ReportSchema,
    logLevel: z.enum(["debug", "info", "warn", "error"]).optional(),
  })
  .strict();

export type ScopeLedgerConfig = z.infer<typeof ScopeLedgerConfigSchema>;
