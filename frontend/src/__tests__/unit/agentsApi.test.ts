import { AgentsApi } from '../../lib/supportChat/agentsApi';
import { ChatRequestError } from '../../lib/supportChat/errors';

const jsonResponse = (body: unknown, status = 200) => new Response(JSON.stringify(body), {
  status,
  headers: { 'Content-Type': 'application/json' },
});

describe('AgentsApi', () => {
  test('lists the active assistants', async () => {
    const urls: string[] = [];
    const api = new AgentsApi('http://localhost:8080/', async (input: string | URL | Request) => {
      urls.push(String(input));
      return jsonResponse({
        ok: true,
        agents: [{ id: 3, name: 'Finance Assistant', specialty: 'Fees and payments', department: 'finance' }],
      });
    });

    expect(await api.list()).toEqual([
      { id: 3, name: 'Finance Assistant', specialty: 'Fees and payments', department: 'finance' },
    ]);
    expect(urls).toEqual(['http://localhost:8080/api/v1/agents']);
  });

  test('maps the welcome message', async () => {
    const api = new AgentsApi('http://localhost:8080', async () => jsonResponse({
      ok: true,
      agent_id: 3,
      agent_name: 'Finance Assistant',
      welcome_message: 'Hi! I can help with fees.',
    }));

    expect(await api.welcome(3)).toEqual({ agentId: 3, agentName: 'Finance Assistant', message: 'Hi! I can help with fees.' });
  });

  test('fails with the status of an error response', async () => {
    const api = new AgentsApi('http://localhost:8080', async () => jsonResponse({ ok: false, error: 'Agent not found' }, 404));

    const failure = await api.welcome(99).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ChatRequestError);
    expect(failure).toMatchObject({ status: 404 });
  });

  test('rejects a malformed payload', async () => {
    const api = new AgentsApi('http://localhost:8080', async () => jsonResponse({ ok: true, agents: [{ id: 'x' }] }));

    await expect(api.list()).rejects.toThrow();
  });
});
