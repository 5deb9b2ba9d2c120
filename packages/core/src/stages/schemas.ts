import { z } from "zod";

export const correctionResponseSchema = z.object({
  lines: z.array(z.string()),
});

export const extractionResponseSchema = z.object({
  quotes: z.array(
    z.object({
      line: z.number().int(),
      text: z.string(),
    })
  ),
});

export const categorizationResponseSchema = z.object({
  topic: z.string(),
});

export type CorrectionResponse = z.infer<typeof correctionResponseSchema>;
export type ExtractionResponse = z.infer<typeof extractionResponseSchema>;
export type CategorizationResponse = z.infer<typeof categorizationResponseSchema>;
