import { AgentDirectory, loadDefaultAgentDirectory } from '../../lib/agents/agentDirectory';
import { AgentClassifier } from '../../lib/chat/agentClassifier';
import { normalizeText } from '../../lib/chat/textMatching';

describe('AgentDirectory', () => {
  const directory = loadDefaultAgentDirectory();

  test('lists only active agents', () => {
    expect(directory.summaries().map((agent) => agent.id)).toEqual([1, 2, 3, 4]);
  });

  test('treats inactive agents as unknown', () => {
    expect(directory.getById(5)).toBeNull();
    expect(directory.getById(3)?.name).toBe('Finance Assistant');
  });

  test('keeps the first agent of a duplicated id', () => {
    const dup = AgentDirectory.fromCatalog({
      agents: [
        { id: 7, name: 'First' },
        { id: 7, name: 'Second' },
      ],
    });
    expect(dup.listActive().map((agent) => agent.name)).toEqual(['First']);
  });

  test('rejects an invalid catalog', () => {
    expect(() => AgentDirectory.fromCatalog({ agents: [{ id: 'x' }] })).toThrow('Agents catalog validation failed');
  });
});

describe('AgentClassifier', () => {
  const classifier = new AgentClassifier(loadDefaultAgentDirectory());

  test('normalizes accents and punctuation', () => {
    expect(normalizeText('¿Olvidé mi CONTRASEÑA?')).toBe('olvide mi contrasena');
  });

  test('picks the agent with the most keyword hits', () => {
    const result = classifier.classify('How much is the tuition fee?');
    expect(result?.agent.id).toBe(3);
    expect(result?.matchedKeywords).toEqual(['tuition', 'fee']);
    expect(result?.score).toBe(2);
  });

  test('matches multi-word keywords without accents', () => {
    expect(classifier.classify('Olvidé mi contraseña del aula virtual')?.agent.id).toBe(4);
  });

  test('keeps catalog order on ties', () => {
    expect(classifier.classify('grades and payment')?.agent.id).toBe(2);
  });

  test('ignores inactive agents and unmatched questions', () => {
    expect(classifier.classify('I need a library book')).toBeNull();
    expect(classifier.classify('   ')).toBeNull();
  });
});
