import { Db } from "../db/database";

/**
 * A conversation is a duplicate when the same provider already holds its provider-native id.
 * Content drift on the provider side is never compared; without a native id nothing matches.
 * An empty string is still an id: the unique index treats it as one.
 */
export function findExistingConversationId(
  db: Db,
  providerId: string,
  providerConversationId: string | undefined | null
): string | undefined {
  if (providerConversationId === undefined || providerConversationId === null) return undefined;
  const row = db
    .prepare<[string, string], { id: string }>(
      "SELECT id FROM conversations WHERE provider_id = ? AND provider_conversation_id = ?"
    )
    .get(providerId, providerConversationId);
  return row?.id;
}
