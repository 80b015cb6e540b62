import {
  DEFAULT_EVENT_TAG,
  EventTagSchema,
  RawEventSchema
} from '@since-sean-left/shared';
import type { EventRecord, EventTag, RawEvent, ValidationOutcome } from '@since-sean-left/shared';

export const MAX_EVENTS = 3;

const NONE_SENTINEL = 'NONE';

export function stripCodeFence(text: string): string {
  return text.replace(/^```[\w-]*\s*/, '').replace(/\s*```$/, '');
}

// Output is spliced into single-quoted JS string literals.
export function escapeForLiteral(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\r\n|\r|\n/g, '\\n')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

// a lone string counts as one tag; anything else that is not an array as none
function toTagList(tags: unknown): readonly unknown[] {
  if (Array.isArray(tags)) return tags;
  if (typeof tags === 'string') return [tags];
  return [];
}

export function filterTags(tags: unknown): EventTag[] {
  const valid: EventTag[] = [];
  for (const tag of toTagList(tags)) {
    const parsed = EventTagSchema.safeParse(tag);
    if (parsed.success) {
      valid.push(parsed.data);
    }
  }
  return valid.length > 0 ? valid : [DEFAULT_EVENT_TAG];
}

function toEventRecord(event: RawEvent): EventRecord {
  return {
    date: event.date,
    title: escapeForLiteral(event.title),
    desc: escapeForLiteral(event.desc),
    tags: filterTags(event.tags)
  };
}

export function validateEvents(candidates: readonly unknown[]): EventRecord[] {
  const validated: EventRecord[] = [];

  for (const candidate of candidates) {
    const parsed = RawEventSchema.safeParse(candidate);
    if (!parsed.success) continue;
    validated.push(toEventRecord(parsed.data));
  }

  return validated.slice(0, MAX_EVENTS);
}

export function parseModelResponse(raw: string): ValidationOutcome {
  const trimmed = raw.trim();

  if (trimmed.toUpperCase() === NONE_SENTINEL) {
    return { kind: 'none' };
  }

  const text = stripCodeFence(trimmed);

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`⚠️ Failed to parse model response: ${reason}`);
    console.warn(`Response was: ${text}`);
    return { kind: 'malformed', reason, raw: text };
  }

  if (!Array.isArray(parsed)) {
    console.warn('⚠️ Model response is not a JSON array');
    return { kind: 'malformed', reason: 'Response is not a JSON array', raw: text };
  }

  return { kind: 'events', events: validateEvents(parsed) };
}
