import { getServices } from '../../core';
import { registerRoute } from '../../utils/routesRegistry';

registerRoute('get', '/api/v1/agents', async (_req, res) => {
  res.json({ ok: true, agents: getServices().directory.summaries() });
});

registerRoute('get', '/api/v1/agents/:agentId/welcome', async (req, res) => {
  const agentId = Number(req.params.agentId);
  const agent = Number.isInteger(agentId) ? getServices().directory.getById(agentId) : null;

  if (!agent) {
    res.status(404).json({ ok: false, error: 'Agent not found' });
    return;
  }

  res.json({
    ok: true,
    agent_id: agent.id,
    agent_name: agent.name,
    welcome_message: agent.welcomeMessage || `Hi! I am ${agent.name}. How can I help you?`,
  });
});
