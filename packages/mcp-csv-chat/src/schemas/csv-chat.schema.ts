import { z } from 'zod';

export const LoadCsvSchema = z.object({
  csv: z
    .string()
    .min(1)
    .describe('Full CSV text. The first row must be the header.'),
  filename: z
    .string()
    .min(1)
    .max(200)
    .optional()
    .describe('Name to show for this dataset (e.g. "sales.csv").'),
});

export type LoadCsvInput = z.infer<typeof LoadCsvSchema>;

export const DescribeDatasetSchema = z.object({
  include_statistics: z
    .boolean()
    .optional()
    .describe('Include per-column summary statistics. Defaults to true.'),
});

export type DescribeDatasetInput = z.infer<typeof DescribeDatasetSchema>;

// Emptiness is checked by the composer so that it surfaces as a ValidationError
export const AskQuestionSchema = z.object({
  question: z
    .string()
    .describe('Natural-language question about the loaded dataset.'),
});

export type AskQuestionInput = z.infer<typeof AskQuestionSchema>;
