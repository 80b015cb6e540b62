import { z } from 'zod';

export const EVENT_TAGS = [
  'scandal',
  'uturn',
  'resignation',
  'broken-promise',
  'failure',
  'polls',
  'economic',
  'security',
  'hypocrisy',
  'crisis',
  'press',
  'rebellion'
] as const;

export const EventTagSchema = z.enum(EVENT_TAGS);
export type EventTag = z.infer<typeof EventTagSchema>;

export const DEFAULT_EVENT_TAG: EventTag = 'crisis';

export const EventDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

// Shape the model is asked to return. Tags only need to be present; they are
// normalised and checked one by one afterwards.
export const RawEventSchema = z.object({
  date: EventDateSchema,
  title: z.string(),
  desc: z.string(),
  tags: z.unknown().refine((value) => value !== undefined, { message: 'Required' })
});

export type RawEvent = z.infer<typeof RawEventSchema>;

export interface NewsItem {
  title: string;
  summary: string;
}

export interface EventRecord {
  date: string;
  title: string;
  desc: string;
  tags: EventTag[];
}

export type ValidationOutcome =
  | { kind: 'none' }
  | { kind: 'malformed'; reason: string; raw: string }
  | { kind: 'events'; events: EventRecord[] };

export type PipelineStatus =
  | 'no-news'
  | 'generation-failed'
  | 'nothing-newsworthy'
  | 'malformed-response'
  | 'no-valid-events'
  | 'anchor-missing'
  | 'updated';

export interface PipelineResult {
  status: PipelineStatus;
  document: string;
  events: EventRecord[];
}
