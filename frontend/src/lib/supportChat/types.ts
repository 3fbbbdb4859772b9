import { z } from 'zod';

const sessionField = { session_id: z.string().optional() };

export const SourceRefSchema = z.object({
  id: z.string(),
  title: z.string(),
  url: z.string().optional(),
});

export type SourceRef = z.infer<typeof SourceRefSchema>;

export const StreamEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('status'), content: z.string().default(''), ...sessionField }),
  z.object({ type: z.literal('context'), sources: z.array(SourceRefSchema).default([]), ...sessionField }),
  z.object({
    type: z.literal('classification'),
    agent_id: z.number().int(),
    agent_name: z.string().default(''),
    stateless: z.boolean().default(false),
    ...sessionField,
  }),
  z.object({ type: z.literal('token'), content: z.string(), ...sessionField }),
  z.object({ type: z.literal('done'), agent_id: z.number().int().nullish(), ...sessionField }),
  z.object({
    type: z.literal('error'),
    content: z.string().default('Unknown error'),
    code: z.string().optional(),
    ...sessionField,
  }),
  z.object({
    type: z.literal('escalation'),
    content: z.string().default(''),
    new_session_id: z.string().min(1),
    metadata: z.object({ agent_name: z.string().default('') }).default({}),
    ...sessionField,
  }),
  z.object({ type: z.literal('confirmation'), content: z.string(), ...sessionField }),
]);

export type StreamEvent = z.infer<typeof StreamEventSchema>;

export const STREAM_EVENT_TYPES: ReadonlySet<string> = new Set(StreamEventSchema.options.map((option) => option.shape.type.value));

const liveRole = z.enum(['user', 'human_agent']);

export const ChannelFrameSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('message'),
    role: liveRole.default('user'),
    content: z.string(),
    user_name: z.string().nullish(),
    timestamp: z.string().optional(),
  }),
  z.object({
    type: z.literal('typing'),
    user_name: z.string().nullish(),
    is_typing: z.boolean().default(true),
    role: liveRole.default('human_agent'),
  }),
  z.object({ type: z.literal('user_joined'), user_name: z.string().nullish(), role: liveRole.default('user') }),
  z.object({ type: z.literal('escalamiento_info'), user_name: z.string().nullish() }),
  z.object({ type: z.literal('finalizacion_escalamiento'), content: z.string().default('') }),
  z.object({ type: z.literal('error'), content: z.string().default('Live chat error') }),
]);

export type ChannelFrame = z.infer<typeof ChannelFrameSchema>;

export type ChatRole = 'user' | 'bot' | 'human_agent' | 'system';

export type ChatMessage = {
  id: string;
  role: ChatRole;
  content: string;
  timestamp: number;
  streaming: boolean;
  variant?: 'error' | 'info' | 'notice';
  sources?: SourceRef[];
  authorName?: string;
  /** HTML produced once the bot turn is final. */
  formatted?: string;
};

export type ControllerMode = 'auto' | 'agent-selected' | 'escalated';

export type ControllerPhase = 'idle' | 'sending' | 'streaming' | 'escalated';

export type TurnOutcome = 'completed' | 'failed' | 'cancelled';

export type ActiveRequest = {
  id: number;
  sessionId: string;
  /** Bot message the turn renders into; created on the first token or context frame. */
  botMessageId: string | null;
};

export type EscalationInfo = {
  sessionId: string;
  agentName: string;
};

export type ControllerState = {
  mode: ControllerMode;
  selectedAgentId: number | null;
  activeRequest: ActiveRequest | null;
  escalation: EscalationInfo | null;
  phase: ControllerPhase;
  lastOutcome: TurnOutcome | null;
  loading: boolean;
  statusText: string | null;
  notice: string | null;
  agentTyping: string | null;
  messages: ChatMessage[];
};

export interface KeyValueStore {
  get(key: string): string | null;
  set(key: string, value: string): void;
}

export interface SpeechOutput {
  speak(text: string): void;
}
