/**
 * Response schemas for every oracle request kind
 */

import { z } from "zod";

const score10 = z.number().transform((value) => Math.min(10, Math.max(0, value)));
const unit = z.number().transform((value) => Math.min(1, Math.max(0, value)));
const optionalText = z
  .string()
  .nullish()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : null));

export const QueriesResponseSchema = z.object({
  queries: z.array(
    z.object({
      query: z.string().min(1),
      angle: z.string().default("general"),
    }),
  ),
});

export type QueriesResponse = z.infer<typeof QueriesResponseSchema>;

export const ScoresResponseSchema = z.object({
  scores: z.array(
    z.object({
      url: z.string().min(1),
      score: score10,
      reason: z.string().default(""),
    }),
  ),
});

export type ScoresResponse = z.infer<typeof ScoresResponseSchema>;

export const FragmentsResponseSchema = z.object({
  relevant: z.boolean().default(true),
  creators: z
    .array(
      z.object({
        name: z.string().min(1),
        handle: optionalText,
        channelUrl: optionalText,
        localityQuote: z.string().default(""),
        categoryQuote: z.string().default(""),
        confidence: unit.default(0.5),
      }),
    )
    .default([]),
});

export type FragmentsResponse = z.infer<typeof FragmentsResponseSchema>;

export const CandidatesResponseSchema = z.object({
  candidates: z.array(
    z.object({
      name: z.string().min(1),
      handle: optionalText,
      fragmentIds: z.array(z.string()).min(1),
    }),
  ),
});

export type CandidatesResponse = z.infer<typeof CandidatesResponseSchema>;

export const FollowupsResponseSchema = z.object({
  queries: z.array(
    z.object({
      candidate: z.string().min(1),
      query: z.string().min(1),
    }),
  ),
});

export type FollowupsResponse = z.infer<typeof FollowupsResponseSchema>;

export const VerdictResponseSchema = z.object({
  survives: z.boolean(),
  localityScore: unit,
  categoryScore: unit,
  concerns: z.array(z.string()).default([]),
  reasoning: z.string().default(""),
});

export type VerdictResponse = z.infer<typeof VerdictResponseSchema>;

export const DirectiveResponseSchema = z.object({
  exhausted: z.boolean().default(false),
  rationale: z.string().default(""),
  angle: z.string().optional(),
  sourceTypes: z.array(z.string()).optional(),
  triageThreshold: score10.optional(),
  widenGeography: z.boolean().optional(),
});

export type DirectiveResponse = z.infer<typeof DirectiveResponseSchema>;
