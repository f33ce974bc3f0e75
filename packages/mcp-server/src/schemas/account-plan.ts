import { z } from "zod";

export const CompanySchema = z.object({
  company: z.string().trim().min(1).describe("Company to research (e.g., Nokia, Siemens)"),
  force_refresh: z.boolean().default(false).describe("Bypass cached search results"),
});

export const AskSchema = CompanySchema.extend({
  question: z.string().trim().min(1).describe("Question about the company (revenue, competitors, strategy, ...)"),
});

export const ReportSchema = CompanySchema.extend({
  directive: z
    .string()
    .default("")
    .describe("What the account plan should focus on, e.g. 'compare 2025 vs 2024 revenue'. Empty for a general plan"),
  format: z.enum(["json", "markdown"]).default("json").describe("Return the report as JSON or rendered Markdown"),
});

export const OverviewSchema = CompanySchema;

export const ResearchSchema = CompanySchema.extend({
  topics: z
    .array(z.string().trim().min(1))
    .min(1)
    .max(10)
    .optional()
    .describe("Research topics; defaults to segment revenue, competitors, strategy and products"),
});

export const EvidenceSchema = CompanySchema.pick({ company: true }).extend({
  question: z.string().trim().min(1).describe("Claim to back with evidence, answered from the knowledge base only"),
});

export const ClarifySchema = CompanySchema.pick({ company: true }).extend({
  directive: z.string().default("").describe("Planned directive, so questions it already settles are not asked"),
});

export type AskInput = z.infer<typeof AskSchema>;
export type ReportInput = z.infer<typeof ReportSchema>;
export type ResearchInput = z.infer<typeof ResearchSchema>;
export type EvidenceInput = z.infer<typeof EvidenceSchema>;
export type ClarifyInput = z.infer<typeof ClarifySchema>;
