import { z } from 'zod';

export const MatchStatus = {
  NotMatched: 0,
  Matched: 1,
  NotApplicable: 2,
} as const;

export const MatchStatusSchema = z.union([
  z.literal(MatchStatus.NotMatched),
  z.literal(MatchStatus.Matched),
  z.literal(MatchStatus.NotApplicable),
]);

export const WebsiteRowSchema = z.object({
  website_id: z.number().int(),
  url: z.string().min(1),
  interval: z.number().int().nonnegative(),
  regex: z.string(),
});

export const HealthcheckRowSchema = z.object({
  check_id: z.number().int(),
  website_fk: z.number().int(),
  request_timestamp: z.number(),
  response_time: z.number(),
  http_status_code: z.number().int(),
  regex_match_status: MatchStatusSchema,
  error_message: z.string(),
});

export const VersionRowSchema = z.object({
  version: z.string(),
});

export type MatchStatus = z.infer<typeof MatchStatusSchema>;
export type WebsiteRow = z.infer<typeof WebsiteRowSchema>;
export type HealthcheckRow = z.infer<typeof HealthcheckRowSchema>;
