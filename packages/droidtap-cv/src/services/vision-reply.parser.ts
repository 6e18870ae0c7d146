import { z } from 'zod';
import { Coordinates, ScreenSize, VisionResult } from '@droidtap/shared';

const visionReplySchema = z
  .object({
    found: z.union([z.boolean(), z.string(), z.number()]).optional(),
    x: z.unknown().optional(),
    y: z.unknown().optional(),
    confidence: z.unknown().optional(),
    description: z.string().optional(),
  })
  .passthrough();

export type VisionReply = z.infer<typeof visionReplySchema>;

const PROSE_COORDINATE_PATTERNS: RegExp[] = [
  /coordinates?\s*\(?\s*(\d+)\s*,\s*(\d+)\s*\)?/i,
  /position\s*\(?\s*(\d+)\s*,\s*(\d+)\s*\)?/i,
  /x\s*[:=]\s*(\d+).*?y\s*[:=]\s*(\d+)/i,
  /\((\d+)\s*,\s*(\d+)\)/,
];

const DEFAULT_CONFIDENCE_PERCENT = 50;
const PROSE_CONFIDENCE = 0.6;
const UNPARSED_CONFIDENCE = 0.3;

function sanitizeJson(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed) {
    return trimmed;
  }
  return trimmed
    .replace(/^```(?:json)?/i, '')
    .replace(/```$/i, '')
    .trim();
}

function coerceNumber(input: unknown): number | null {
  if (typeof input === 'number' && Number.isFinite(input)) {
    return input;
  }
  if (typeof input === 'string') {
    const match = input.trim().match(/-?\d+(?:\.\d+)?/);
    if (!match) {
      return null;
    }
    const parsed = Number.parseFloat(match[0]);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function isFound(value: VisionReply['found']): boolean {
  if (typeof value === 'string') {
    return ['true', 'yes', 'y'].includes(value.trim().toLowerCase());
  }
  if (typeof value === 'number') {
    return value !== 0;
  }
  return value === true;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Pulls an `(x, y)` pair out of a free-text reply. Pairs outside `bounds`
 * are ignored and the next pattern is tried.
 */
export function extractCoordinatesFromProse(
  text: string,
  bounds: ScreenSize,
): Coordinates | null {
  for (const pattern of PROSE_COORDINATE_PATTERNS) {
    const match = text.match(pattern);
    if (!match) {
      continue;
    }
    const x = Number.parseInt(match[1], 10);
    const y = Number.parseInt(match[2], 10);
    if (x >= 0 && x <= bounds.width && y >= 0 && y <= bounds.height) {
      return { x, y };
    }
  }
  return null;
}

/**
 * Interprets a vision model reply to a find-element prompt. Coordinates are
 * left in the pixel space of the image the model saw.
 */
export function parseVisionReply(
  raw: string,
  target: string,
  bounds: ScreenSize,
): VisionResult {
  const json = parseJson(sanitizeJson(raw));
  const parsed =
    json === undefined ? undefined : visionReplySchema.safeParse(json);

  if (parsed?.success) {
    const reply = parsed.data;
    if (!isFound(reply.found)) {
      return { description: `Could not find: ${target}`, confidence: 0 };
    }

    const percent =
      coerceNumber(reply.confidence) ?? DEFAULT_CONFIDENCE_PERCENT;
    const confidence = Math.min(Math.max(percent / 100, 0), 1);
    const x = coerceNumber(reply.x);
    const y = coerceNumber(reply.y);
    const description = reply.description || target;

    if (x === null || y === null) {
      return { description, confidence };
    }
    return {
      description,
      coordinates: { x: Math.round(x), y: Math.round(y) },
      confidence,
    };
  }

  const coordinates = extractCoordinatesFromProse(raw, bounds);
  if (coordinates) {
    return { description: target, coordinates, confidence: PROSE_CONFIDENCE };
  }
  return { description: raw.trim(), confidence: UNPARSED_CONFIDENCE };
}
