/**
 * DLive GraphQL endpoint and the fixed operations sent to it.
 */

export const GRAPHQL_ENDPOINT = "https://graphigo.prd.dlive.tv/";

export const PAST_BROADCAST_QUERY =
  "query PastBroadcastPage($permlink: String!) { " +
  "pastBroadcast(permlink: $permlink) { " +
  "id title length playbackUrl createdAt thumbnailUrl viewCount " +
  "creator { displayname username } } }";

export const PAST_BROADCAST_LIST_QUERY =
  "query PastBroadcastList($displayname: String!, $first: Int!) { " +
  "userByDisplayName(displayname: $displayname) { " +
  "displayname username " +
  "pastBroadcastsV2(first: $first) { " +
  "list { id permlink title length createdAt playbackUrl viewCount } } } }";

export interface GraphQLRequest<TVariables> {
  operationName: string;
  variables: TVariables;
  query: string;
}

export function pastBroadcastRequest(permlink: string): GraphQLRequest<{ permlink: string }> {
  return {
    operationName: "PastBroadcastPage",
    variables: { permlink },
    query: PAST_BROADCAST_QUERY,
  };
}

export function pastBroadcastListRequest(
  displayname: string,
  first: number
): GraphQLRequest<{ displayname: string; first: number }> {
  return {
    operationName: "PastBroadcastList",
    variables: { displayname, first },
    query: PAST_BROADCAST_LIST_QUERY,
  };
}
