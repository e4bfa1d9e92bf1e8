/**
 * Zod schemas for DLive GraphQL responses.
 * Fields are lenient on purpose: the API has changed field names and shapes
 * between revisions, and normalization happens after validation.
 */

import { z } from "zod";

// ============================================================================
// Envelope
// ============================================================================

const GraphQLErrorSchema = z.object({
  message: z.string().optional(),
});

export const GraphQLEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(GraphQLErrorSchema).optional(),
});

export type GraphQLEnvelope = z.infer<typeof GraphQLEnvelopeSchema>;

// ============================================================================
// Past Broadcast
// ============================================================================

const IdSchema = z.union([z.string(), z.number()]);

const CreatorSchema = z.object({
  displayname: z.string().nullish(),
  username: z.string().nullish(),
});

export const PastBroadcastSchema = z.object({
  id: IdSchema.nullish(),
  title: z.string().nullish(),
  // Seconds; current API revision
  length: z.unknown(),
  // Older revisions
  duration: z.unknown(),
  playbackUrl: z.string().nullish(),
  createdAt: IdSchema.nullish(),
  thumbnailUrl: z.string().nullish(),
  viewCount: z.number().nullish(),
  creator: CreatorSchema.nullish(),
});

export type PastBroadcast = z.infer<typeof PastBroadcastSchema>;

export const PastBroadcastPageDataSchema = z.object({
  pastBroadcast: PastBroadcastSchema.nullish(),
});

// ============================================================================
// Past Broadcast List
// ============================================================================

export const PastBroadcastListItemSchema = PastBroadcastSchema.extend({
  permlink: z.string().nullish(),
});

export type PastBroadcastListItem = z.infer<typeof PastBroadcastListItemSchema>;

export const PastBroadcastListDataSchema = z.object({
  userByDisplayName: z
    .object({
      displayname: z.string().nullish(),
      username: z.string().nullish(),
      pastBroadcastsV2: z
        .object({
          list: z.array(PastBroadcastListItemSchema).nullish(),
        })
        .nullish(),
    })
    .nullish(),
});

export type PastBroadcastListData = z.infer<typeof PastBroadcastListDataSchema>;

// ============================================================================
// Normalization
// ============================================================================

/**
 * Converts a number or numeric string to an integer (truncating).
 * Anything else, including empty strings, becomes undefined.
 */
export function toOptionalInt(value: unknown): number | undefined {
  let numeric: number;
  if (typeof value === "number") {
    numeric = value;
  } else if (typeof value === "string" && value.trim() !== "") {
    numeric = Number(value.trim());
  } else {
    return undefined;
  }
  return Number.isFinite(numeric) ? Math.trunc(numeric) : undefined;
}

/**
 * Normalizes every known duration shape to whole seconds:
 * `125`, `"125"` and `{ seconds: 125 }` (optionally with `minutes`/`hours`).
 * Unparsable or negative values become undefined.
 */
export function normalizeDuration(value: unknown): number | undefined {
  let seconds: number | undefined;

  if (typeof value === "object" && value !== null) {
    const parts = new Map(Object.entries(value));
    const hours = toOptionalInt(parts.get("hours"));
    const minutes = toOptionalInt(parts.get("minutes"));
    const secs = toOptionalInt(parts.get("seconds"));
    if (hours === undefined && minutes === undefined && secs === undefined) {
      return undefined;
    }
    seconds = (hours ?? 0) * 3600 + (minutes ?? 0) * 60 + (secs ?? 0);
  } else {
    seconds = toOptionalInt(value);
  }

  return seconds !== undefined && seconds >= 0 ? seconds : undefined;
}
