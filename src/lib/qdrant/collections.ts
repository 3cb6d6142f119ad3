import { errorStatus, type QdrantAdminClient } from "./client";

export const DOCUMENT_CHUNKS_COLLECTION = "document_chunks";

/** Keyword fields the store filters on. */
const PAYLOAD_INDEXES = ["symbol", "source_revision"] as const;

function alreadyExists(err: unknown): boolean {
  if (errorStatus(err) === 409) return true;
  return err instanceof Error && /already exists/i.test(err.message);
}

async function ensurePayloadIndexes(client: QdrantAdminClient, collectionName: string): Promise<void> {
  for (const field of PAYLOAD_INDEXES) {
    try {
      await client.createPayloadIndex(collectionName, {
        wait: true,
        field_name: field,
        field_schema: "keyword",
      });
    } catch (err) {
      if (alreadyExists(err)) continue;
      throw err;
    }
  }
}

/** Create the chunk collection (cosine distance) and its payload indexes if missing. */
export async function ensureDocumentChunksCollection(
  client: QdrantAdminClient,
  vectorSize: number,
  collectionName = DOCUMENT_CHUNKS_COLLECTION,
): Promise<void> {
  const existing = await client.getCollections();
  const found = existing.collections.some((c) => c.name === collectionName);
  if (!found) {
    await client.createCollection(collectionName, {
      vectors: { size: vectorSize, distance: "Cosine" },
    });
    console.log(`[qdrant] Created collection ${collectionName} (${vectorSize} dims).`);
  }
  await ensurePayloadIndexes(client, collectionName);
}
