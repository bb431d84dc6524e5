import * as fs from 'fs';
import { z } from 'zod';
import type { ModerationEvent } from './types.js';

export const DEFAULT_PERSONA = 'firm_professional';

const ContextSchema = z.object({
  followerCount: z.number().nonnegative().optional(),
  viewerCount: z.number().nonnegative().optional(),
  currentTopic: z.string().optional(),
});

const eventText = z.string().refine((s) => s.trim().length > 0, 'text must not be blank');

const NativeEventSchema = z.object({
  subjectId: z.string().min(1),
  text: eventText,
  persona: z.string().min(1).optional(),
  context: ContextSchema.optional(),
});

// `{ comment, meta: { user, ... }, persona }` rows from older datasets
const LegacyEventSchema = z.object({
  comment: eventText,
  meta: z.object({
    user: z.string().min(1).optional(),
    follower_count: z.number().nonnegative().optional(),
    viewer_count: z.number().nonnegative().optional(),
    topic: z.string().optional(),
  }).passthrough().default({}),
  persona: z.string().min(1).optional(),
});

const EventRowSchema = z.union([NativeEventSchema, LegacyEventSchema]);

type EventRow = z.infer<typeof EventRowSchema>;

function toEvent(row: EventRow): ModerationEvent {
  if ('subjectId' in row) {
    return {
      subjectId: row.subjectId,
      text: row.text,
      persona: row.persona ?? DEFAULT_PERSONA,
      ...(row.context ? { context: row.context } : {}),
    };
  }

  const { meta } = row;
  const hasContext = meta.follower_count !== undefined
    || meta.viewer_count !== undefined
    || meta.topic !== undefined;

  return {
    subjectId: meta.user ?? 'unknown',
    text: row.comment,
    persona: row.persona ?? DEFAULT_PERSONA,
    ...(hasContext
      ? {
          context: {
            followerCount: meta.follower_count,
            viewerCount: meta.viewer_count,
            currentTopic: meta.topic,
          },
        }
      : {}),
  };
}

export function parseEvents(raw: unknown): ModerationEvent[] {
  if (!Array.isArray(raw)) {
    throw new Error('Event dataset must be a JSON array');
  }

  return raw.map((row: unknown, i) => {
    const parsed = EventRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new Error(`Invalid event at index ${i}: expected { subjectId, text } or { comment, meta }`);
    }
    return toEvent(parsed.data);
  });
}

export function loadEvents(filePath: string): ModerationEvent[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Event dataset not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new Error(`Event dataset ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseEvents(raw);
}

const PersonaTemplatesSchema = z.record(
  z.string(),
  z.array(z.object({ text: z.string().min(1), subjectPrefix: z.string().min(1) })).min(1)
);

const PERSONAS_URL = new URL('../../data/personas.json', import.meta.url);

export function loadPersonaTemplates(): z.infer<typeof PersonaTemplatesSchema> {
  return PersonaTemplatesSchema.parse(JSON.parse(fs.readFileSync(PERSONAS_URL, 'utf-8')));
}

/**
 * Synthetic events drawn from the persona templates, one new subject per
 * event. `random` returns values in [0, 1).
 */
export function synthesizeEvents(count: number, random: () => number = Math.random): ModerationEvent[] {
  const templates = loadPersonaTemplates();
  const personas = Object.keys(templates);
  if (personas.length === 0) {
    throw new Error('No persona templates available');
  }

  const pick = <T>(items: T[]): T => items[Math.min(items.length - 1, Math.floor(random() * items.length))];

  const events: ModerationEvent[] = [];
  for (let i = 1; i <= count; i++) {
    const persona = pick(personas);
    const template = pick(templates[persona]);
    events.push({
      subjectId: `${template.subjectPrefix}_${String(i).padStart(3, '0')}`,
      text: template.text,
      persona,
    });
  }
  return events;
}
