import { getServices } from '../../core';
import { registerRoute } from '../../utils/routesRegistry';

registerRoute('get', '/api/v1/conversations/:sessionId', async (req, res) => {
  const conversation = await getServices().repository.findBySession(req.params.sessionId);
  if (!conversation) {
    res.status(404).json({ ok: false, error: 'Conversation not found' });
    return;
  }

  res.json({
    ok: true,
    conversation: {
      ...conversation,
      createdAt: conversation.createdAt.toISOString(),
      updatedAt: conversation.updatedAt.toISOString(),
      messages: conversation.messages.map((message) => ({
        ...message,
        createdAt: message.createdAt.toISOString(),
      })),
    },
  });
});
