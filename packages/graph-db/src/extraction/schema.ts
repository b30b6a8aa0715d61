import { z } from "zod";

const attributeValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const extractedEntitySchema = z.object({
  name: z.string().trim().min(1),
  labels: z.array(z.string().trim().min(1)).default([]),
  summary: z.string().default(""),
  attributes: z.record(attributeValueSchema).default({}),
});

export const extractedFactSchema = z.object({
  source: z.string().trim().min(1),
  target: z.string().trim().min(1),
  relation: z.string().trim().min(1),
  fact: z.string().trim().min(1),
  validAt: z.string().nullable().default(null),
  invalidAt: z.string().nullable().default(null),
});

export const extractedGraphSchema = z.object({
  entities: z.array(extractedEntitySchema).default([]),
  facts: z.array(extractedFactSchema).default([]),
});

export type ExtractedEntity = z.infer<typeof extractedEntitySchema>;
export type ExtractedFact = z.infer<typeof extractedFactSchema>;
export type ExtractedGraph = z.infer<typeof extractedGraphSchema>;
