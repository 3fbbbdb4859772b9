export type RetrievedDocument = {
  id: string;
  title: string;
  content: string;
  url?: string;
  score?: number;
};

export type RetrievalQuery = {
  question: string;
  agentId: number;
  limit: number;
};

/**
 * Retrieval boundary. Embedding, indexing and ranking live behind it; the chat
 * stream only needs the top documents for a question.
 */
export interface ContextRetriever {
  retrieve(query: RetrievalQuery): Promise<RetrievedDocument[]>;
}

export class NoopContextRetriever implements ContextRetriever {
  async retrieve(): Promise<RetrievedDocument[]> {
    return [];
  }
}
