import { config, getServices } from '../../core';
import { registerRoute } from '../../utils/routesRegistry';

registerRoute('get', '/api/v1/health', async (_req, res) => {
  const { llm, directory } = getServices();
  const providers = llm.configuredProviderNames();
  const llmStatus = providers.length > 0 ? 'configured' : 'unconfigured';

  res.json({
    ok: llmStatus === 'configured',
    status: llmStatus === 'configured' ? 'green' : 'red',
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
    env: config.env,
    services: {
      llm: llmStatus,
      providers,
      primaryProvider: config.llm.provider,
      agents: directory.listActive().length,
    },
  });
});
