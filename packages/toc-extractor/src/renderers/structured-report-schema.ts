import { z } from 'zod';

/**
 * One entry of a structured report; absent fields are null
 */
export const StructuredEntrySchema = z.object({
  kind: z.enum(['section', 'item']).describe('Entry kind'),
  section: z.string().min(1).describe('Section heading the entry belongs to'),
  title: z.string().min(1).nullable().describe('Item title'),
  author: z.string().min(1).nullable().describe('Item author'),
  page: z.number().int().min(1).max(999).nullable().describe('Printed page'),
});

export const StructuredReportSchema = z.object({
  issue: z.string().nullable().describe('Issue line, e.g. masthead and date'),
  brand: z.enum(['newyorker', 'atlantic', 'harpers', 'unknown']),
  entries: z.array(StructuredEntrySchema),
});

export type StructuredEntry = z.infer<typeof StructuredEntrySchema>;
export type StructuredReport = z.infer<typeof StructuredReportSchema>;
