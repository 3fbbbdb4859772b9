import { z } from 'zod';
import { logger } from '../../helpers/logger';
import { ChatRequestError } from './errors';

const log = logger.child('agents');

const AgentSummarySchema = z.object({
  id: z.number().int(),
  name: z.string(),
  specialty: z.string().default(''),
  department: z.string().default(''),
});

export type AgentOption = z.infer<typeof AgentSummarySchema>;

const AgentsResponseSchema = z.object({
  ok: z.literal(true),
  agents: z.array(AgentSummarySchema),
});

const WelcomeResponseSchema = z.object({
  ok: z.literal(true),
  agent_id: z.number().int(),
  agent_name: z.string(),
  welcome_message: z.string(),
});

export type AgentWelcome = {
  agentId: number;
  agentName: string;
  message: string;
};

export class AgentsApi {
  constructor(
    private readonly baseUrl: string,
    private readonly fetchImpl?: typeof fetch,
  ) {}

  async list(): Promise<AgentOption[]> {
    const data = AgentsResponseSchema.parse(await this.getJson('/api/v1/agents'));
    return data.agents;
  }

  async welcome(agentId: number): Promise<AgentWelcome> {
    const data = WelcomeResponseSchema.parse(await this.getJson(`/api/v1/agents/${agentId}/welcome`));
    return { agentId: data.agent_id, agentName: data.agent_name, message: data.welcome_message };
  }

  private async getJson(path: string): Promise<unknown> {
    const doFetch = this.fetchImpl ?? fetch;
    const res = await doFetch(`${this.baseUrl.replace(/\/$/, '')}${path}`, { headers: { Accept: 'application/json' } });
    if (!res.ok) {
      log.warn(`GET ${path} failed`, { status: res.status });
      throw new ChatRequestError(`Request failed with status ${res.status}`, res.status);
    }
    return res.json();
  }
}
