export const LAW_TYPES = ["LC", "DECRETO", "LEI", "DOC"] as const;

export type LawType = (typeof LAW_TYPES)[number];

export interface LawIdentifier {
  type: LawType;
  number: string;
  year: number;
}

export interface ChunkMetadata {
  fonte: string;
  ano_publicacao: number;
  chunk_index: number;
  ID_UNICO: string;
}

export interface ChunkRecord {
  id: string;
  text: string;
  metadata: ChunkMetadata;
}

/**
 * Document map entry. `row_index` is the row of this chunk inside the vector
 * index; retrieval resolves hits through it, never through key order.
 */
export interface IndexedChunkRecord extends ChunkRecord {
  row_index: number;
}

export type ConversationRole = "user" | "assistant";

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}
