import { z } from 'zod';

export const DEFAULTS = {
    maxQuestions: 3,
    similarityThreshold: 0.8,
    outputFormat: 'turtle',
    includeSignatures: false,
} as const;

export const PipelineOptionsSchema = z.object({
    maxQuestions: z.number().int().min(0).default(DEFAULTS.maxQuestions),
    includeSignatures: z.boolean().default(DEFAULTS.includeSignatures),
});

export interface PipelineOptionsInput extends z.input<typeof PipelineOptionsSchema> {
    /** One of OUTPUT_FORMATS, spelled exactly; default 'turtle' */
    outputFormat?: string;
}

export type PipelineOptions = z.infer<typeof PipelineOptionsSchema>;

export const SimilarityThresholdSchema = z.number().min(0).max(1);
