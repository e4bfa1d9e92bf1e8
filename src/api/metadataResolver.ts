/**
 * Resolves DLive broadcast metadata through the GraphQL API.
 */
import { z } from "zod";
import { DLiveAPIError, TransportError, ValidationError } from "../downloader/shared/errors.js";
import type { Broadcast } from "../downloader/shared/types.js";
import type { HttpFetcher } from "../shared/http.js";
import { logger } from "../shared/logger.js";
import {
  GRAPHQL_ENDPOINT,
  pastBroadcastListRequest,
  pastBroadcastRequest,
  type GraphQLRequest,
} from "./queries.js";
import {
  GraphQLEnvelopeSchema,
  PastBroadcastListDataSchema,
  PastBroadcastPageDataSchema,
  normalizeDuration,
  toOptionalInt,
} from "./schemas.js";

const UNKNOWN_CREATOR = "unknown";
const BODY_PREVIEW_LENGTH = 200;

function firstNonEmpty(...values: (string | number | null | undefined)[]): string | undefined {
  for (const value of values) {
    if (value !== null && value !== undefined && String(value) !== "") {
      return String(value);
    }
  }
  return undefined;
}

export class MetadataResolver {
  constructor(
    private readonly fetcher: HttpFetcher,
    private readonly endpoint: string = GRAPHQL_ENDPOINT
  ) {}

  /**
   * Looks up a past broadcast by its permlink.
   */
  async resolveBroadcast(permlink: string): Promise<Broadcast> {
    const data = await this.query(pastBroadcastRequest(permlink), PastBroadcastPageDataSchema);

    const broadcast = data.pastBroadcast;
    if (!broadcast) {
      throw new DLiveAPIError("Broadcast not found or not accessible.", "not_found", {
        details: `permlink: ${permlink}`,
      });
    }

    if (!broadcast.playbackUrl) {
      throw new DLiveAPIError("Broadcast is missing a playback URL.", "not_streamable", {
        details: `permlink: ${permlink}`,
      });
    }

    return {
      id: firstNonEmpty(broadcast.id, permlink) ?? permlink,
      permlink,
      title: firstNonEmpty(broadcast.title, permlink) ?? permlink,
      creatorName:
        firstNonEmpty(broadcast.creator?.displayname, broadcast.creator?.username) ??
        UNKNOWN_CREATOR,
      playbackUrl: broadcast.playbackUrl,
      createdAtMs: toOptionalInt(broadcast.createdAt),
      durationSeconds: normalizeDuration(broadcast.length ?? broadcast.duration),
    };
  }

  /**
   * Lists a channel's most recent past broadcasts.
   * An unknown channel and a channel without broadcasts fail with different
   * reasons ("channel_not_found" vs "channel_empty").
   */
  async listRecentBroadcasts(channelName: string, limit = 15): Promise<Broadcast[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError(`Broadcast limit must be a positive integer, got ${limit}`);
    }

    const data = await this.query(
      pastBroadcastListRequest(channelName, limit),
      PastBroadcastListDataSchema
    );

    const user = data.userByDisplayName;
    if (!user) {
      throw new DLiveAPIError(`Channel "${channelName}" not found.`, "channel_not_found");
    }

    const creatorName = firstNonEmpty(user.displayname, user.username) ?? channelName;
    const broadcasts: Broadcast[] = [];

    for (const item of user.pastBroadcastsV2?.list ?? []) {
      if (!item.playbackUrl || !item.permlink) continue;

      broadcasts.push({
        id: firstNonEmpty(item.id, item.permlink) ?? item.permlink,
        permlink: item.permlink,
        title: firstNonEmpty(item.title, item.permlink) ?? item.permlink,
        creatorName,
        playbackUrl: item.playbackUrl,
        createdAtMs: toOptionalInt(item.createdAt),
        durationSeconds: normalizeDuration(item.length ?? item.duration),
      });
    }

    if (broadcasts.length === 0) {
      throw new DLiveAPIError(
        `Channel "${channelName}" has no past broadcasts.`,
        "channel_empty"
      );
    }

    return broadcasts;
  }

  private async query<TData>(
    request: GraphQLRequest<unknown>,
    dataSchema: z.ZodType<TData>
  ): Promise<TData> {
    logger.debug(`GraphQL ${request.operationName} request: ${JSON.stringify(request.variables)}`);

    let text: string;
    try {
      text = await this.fetcher.postJson(this.endpoint, request);
    } catch (error) {
      if (error instanceof TransportError && error.statusCode !== undefined) {
        throw new DLiveAPIError(
          `API request failed (HTTP ${error.statusCode}): ${error.body ?? "empty response"}`,
          "http",
          { statusCode: error.statusCode, details: error.body, cause: error }
        );
      }
      throw error;
    }

    logger.debug(`GraphQL ${request.operationName} response: ${text.substring(0, 500)}`);

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      throw new DLiveAPIError(
        `Could not parse API response: ${text.substring(0, BODY_PREVIEW_LENGTH)}`,
        "malformed",
        { cause: error }
      );
    }

    const envelope = GraphQLEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw new DLiveAPIError(
        `Unexpected API response: ${text.substring(0, BODY_PREVIEW_LENGTH)}`,
        "malformed",
        { details: z.prettifyError(envelope.error) }
      );
    }

    const { errors } = envelope.data;
    if (errors) {
      const message = errors.map((error) => error.message ?? "Unknown error").join("\n");
      throw new DLiveAPIError(message || "Unknown error", "graphql");
    }

    const data = dataSchema.safeParse(envelope.data.data ?? {});
    if (!data.success) {
      throw new DLiveAPIError(
        `Unexpected API response shape for ${request.operationName}`,
        "malformed",
        { details: z.prettifyError(data.error) }
      );
    }

    return data.data;
  }
}
