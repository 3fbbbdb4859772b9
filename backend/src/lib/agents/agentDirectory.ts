import { z } from 'zod';
import catalog from '../../data/agents.json';
import { logger } from '../../utils/logger';

const log = logger.child('AgentDirectory');

const AgentSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  specialty: z.string().default(''),
  tone: z.string().default('neutral'),
  style: z.string().default('clear'),
  active: z.boolean().default(true),
  department: z.string().default('general'),
  welcomeMessage: z.string().default(''),
  keywords: z.array(z.string()).default([]),
});

const AgentCatalogSchema = z.object({
  agents: z.array(AgentSchema),
});

export type Agent = z.infer<typeof AgentSchema>;

export type AgentSummary = Pick<Agent, 'id' | 'name' | 'specialty' | 'department'>;

export class AgentDirectory {
  private readonly agents: Agent[];

  constructor(agents: Agent[]) {
    const seen = new Set<number>();
    this.agents = agents.filter((agent) => {
      if (seen.has(agent.id)) {
        log.warn(`Duplicate agent id ${agent.id} ignored`);
        return false;
      }
      seen.add(agent.id);
      return true;
    });
  }

  static fromCatalog(raw: unknown): AgentDirectory {
    const parsed = AgentCatalogSchema.safeParse(raw);
    if (!parsed.success) {
      log.error('Invalid agents catalog', parsed.error.format());
      throw new Error('Agents catalog validation failed');
    }
    return new AgentDirectory(parsed.data.agents);
  }

  listActive(): Agent[] {
    return this.agents.filter((agent) => agent.active);
  }

  summaries(): AgentSummary[] {
    return this.listActive().map(({ id, name, specialty, department }) => ({ id, name, specialty, department }));
  }

  /** Inactive agents are treated as unknown. */
  getById(id: number): Agent | null {
    return this.agents.find((agent) => agent.id === id && agent.active) ?? null;
  }
}

export const loadDefaultAgentDirectory = () => AgentDirectory.fromCatalog(catalog);
