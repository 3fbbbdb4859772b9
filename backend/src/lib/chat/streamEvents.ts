export type SourceRef = { id: string; title: string; url?: string };

export type StreamErrorCode =
  | 'agent_required'
  | 'agent_not_found'
  | 'session_escalated'
  | 'session_closed'
  | 'no_staff_available'
  | 'llm_unavailable'
  | 'internal_error';

type Stamped = { session_id?: string };

export type ServerStreamEvent = Stamped & (
  | { type: 'status'; content: string }
  | { type: 'context'; sources: SourceRef[] }
  | { type: 'classification'; agent_id: number; agent_name: string; stateless: boolean }
  | { type: 'token'; content: string }
  | { type: 'done'; agent_id?: number | null }
  | { type: 'error'; content: string; code?: StreamErrorCode }
  | { type: 'escalation'; content: string; new_session_id: string; metadata: { agent_name: string } }
  | { type: 'confirmation'; content: string }
);

export const STREAM_END_FRAME = 'data: [DONE]\n\n';

export const formatFrame = (event: ServerStreamEvent): string => `data: ${JSON.stringify(event)}\n\n`;

export const isTerminalEvent = (event: ServerStreamEvent) => event.type === 'done' || event.type === 'error';
