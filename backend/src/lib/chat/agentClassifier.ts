import type { Agent, AgentDirectory } from '../agents/agentDirectory';
import { containsPhrase, normalizeText } from './textMatching';

export type AgentClassification = {
  agent: Agent;
  score: number;
  matchedKeywords: string[];
};

/**
 * Keyword classifier: the active agent with the most keyword hits wins, ties keep
 * catalog order. No hit means no classification; the caller asks the user to pick.
 */
export class AgentClassifier {
  constructor(private readonly directory: AgentDirectory) {}

  classify(question: string): AgentClassification | null {
    const text = normalizeText(question);
    if (!text) return null;

    let best: AgentClassification | null = null;
    for (const agent of this.directory.listActive()) {
      const matchedKeywords = agent.keywords.filter((keyword) => containsPhrase(text, keyword));
      if (matchedKeywords.length === 0) continue;
      if (!best || matchedKeywords.length > best.score) {
        best = { agent, score: matchedKeywords.length, matchedKeywords };
      }
    }
    return best;
  }
}
