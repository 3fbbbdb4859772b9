import React from 'react';
import type { AgentOption } from '../../lib/supportChat/agentsApi';

export interface AgentSelectorProps {
  agents: AgentOption[];
  selectedAgentId: number | null;
  disabled: boolean;
  onSelect: (agentId: number | null) => void;
}

const AUTO = 'auto';

export const AgentSelector: React.FC<AgentSelectorProps> = ({ agents, selectedAgentId, disabled, onSelect }) => (
  <select
    aria-label="Choose an assistant"
    className="w-full rounded-lg border border-gray-200 bg-white px-2 py-1 text-xs text-gray-700"
    disabled={disabled}
    value={selectedAgentId === null ? AUTO : String(selectedAgentId)}
    onChange={(e) => onSelect(e.target.value === AUTO ? null : Number(e.target.value))}
  >
    <option value={AUTO}>Automatic (let the assistant decide)</option>
    {agents.map((agent) => (
      <option key={agent.id} value={String(agent.id)}>
        {agent.specialty ? `${agent.name} (${agent.specialty})` : agent.name}
      </option>
    ))}
  </select>
);
