export type OriginType = 'webpage' | 'pdf';

export interface Document {
  documentId: string;
  sourceFilename: string;
  originType: OriginType;
  originURL?: string;
  /** 0-based page index, PDFs only */
  pageNumber?: number;
  rawText: string;
}

export interface ChunkMetadata {
  source: string;
  type: OriginType;
  url?: string;
  page?: number;
  ordinal: number;
}

export interface Chunk {
  chunkId: string;
  parentDocumentId: string;
  ordinal: number;
  text: string;
  /** Offsets of text within the parent's rawText: [start, end) */
  start: number;
  end: number;
  metadata: ChunkMetadata;
}
