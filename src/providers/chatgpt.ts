import { ProviderArtifact, ProviderConversationDetail } from "./adapter";
import {
  artifactTypeFor,
  ExportFiles,
  ExportParseResult,
  getArray,
  getObject,
  getString,
  loadJsonDocuments,
  MessageDraft,
  sequenceDrafts,
  textFromUnknown,
  toIsoOrUndefined
} from "./common";

async function attachmentFromObject(
  attachment: Record<string, unknown>,
  files: ExportFiles
): Promise<Omit<ProviderArtifact, "message_sequence_index">> {
  const providerArtifactId = getString(attachment.id) ?? getString(attachment.asset_pointer);
  const mimeType = getString(attachment.mime_type) ?? getString(attachment.mimeType);
  const localFile = providerArtifactId ? files.find(undefined, providerArtifactId) : undefined;
  const content = localFile ? await files.read(localFile) : undefined;

  return {
    provider_artifact_id: providerArtifactId,
    artifact_type: artifactTypeFor(mimeType, getString(attachment.type)),
    filename: getString(attachment.name),
    mime_type: mimeType,
    content,
    download_status: content ? "success" : "not_supported",
    download_error: content ? undefined : "Attachment file is not included in the export",
    raw_metadata: attachment
  };
}

export async function parseChatGPTExport(extractedRoot: string): Promise<ExportParseResult> {
  const files = await ExportFiles.scan(extractedRoot);
  const docs = await loadJsonDocuments(extractedRoot, files.all);
  const warnings: string[] = [];

  const conversationDoc = docs.find((doc) => doc.relPath.toLowerCase().endsWith("conversations.json"));
  const fallbackDoc = docs.find(
    (doc) => Array.isArray(doc.value) && doc.value.some((item) => getObject(item)?.mapping !== undefined)
  );

  const targetDoc = conversationDoc || fallbackDoc;
  if (!targetDoc) {
    throw new Error("ChatGPT export does not contain a usable conversations JSON file.");
  }

  const conversations: ProviderConversationDetail[] = [];

  for (const row of getArray(targetDoc.value)) {
    const conv = getObject(row);
    if (!conv) continue;

    const providerConversationId = getString(conv.id) ?? getString(conv.conversation_id);
    if (!providerConversationId) {
      warnings.push(`Skipped a conversation without an id in ${targetDoc.relPath}.`);
      continue;
    }

    const drafts: MessageDraft[] = [];
    for (const mapNode of Object.values(getObject(conv.mapping) ?? {})) {
      const node = getObject(mapNode);
      const msgObj = getObject(node?.message);
      if (!node || !msgObj) continue;

      const providerMessageId = getString(msgObj.id) ?? getString(node.id);
      if (!providerMessageId) continue;

      const contentObj = getObject(msgObj.content);
      const text = textFromUnknown(contentObj?.parts ?? contentObj?.text ?? msgObj.content);
      const rawAttachments = getArray(getObject(msgObj.metadata)?.attachments);

      // Empty system scaffolding nodes carry nothing worth archiving.
      if (!text && !rawAttachments.length) continue;

      const artifacts: MessageDraft["artifacts"] = [];
      for (const rawAttachment of rawAttachments) {
        const attachment = getObject(rawAttachment);
        if (attachment) artifacts.push(await attachmentFromObject(attachment, files));
      }

      drafts.push({
        key: providerMessageId,
        message: {
          provider_message_id: providerMessageId,
          role: getString(getObject(msgObj.author)?.role) ?? "unknown",
          content: text,
          created_at: toIsoOrUndefined(msgObj.create_time ?? node.create_time),
          raw_metadata: { model: getString(getObject(msgObj.metadata)?.model_slug) ?? null }
        },
        artifacts
      });
    }

    const { messages, artifacts } = sequenceDrafts(drafts);
    conversations.push({
      provider_conversation_id: providerConversationId,
      title: getString(conv.title),
      started_at: toIsoOrUndefined(conv.create_time),
      ended_at: toIsoOrUndefined(conv.update_time),
      messages,
      artifacts,
      raw_metadata: { source_path: targetDoc.relPath }
    });
  }

  if (!conversations.length) {
    warnings.push("No conversations parsed from ChatGPT export payload.");
  }

  return { provider: "openai", conversations, warnings };
}
