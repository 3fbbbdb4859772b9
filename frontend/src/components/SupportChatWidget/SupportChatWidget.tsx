import React, { useCallback, useEffect, useRef, useState } from 'react';
import { observer } from 'mobx-react-lite';
import { ArrowUturnLeftIcon, ChatBubbleLeftRightIcon, XMarkIcon } from '@heroicons/react/24/outline';
import classNames from '../../helpers/classNames';
import { logger } from '../../helpers/logger';
import type { AgentOption, AgentsApi } from '../../lib/supportChat/agentsApi';
import type { ChatSessionController } from '../../lib/supportChat/chatSessionController';
import { AgentSelector } from './AgentSelector';
import { Composer } from './Composer';
import { MessageList } from './MessageList';
import type { WidgetConfig } from './types';

const log = logger.child('widget');

export interface SupportChatWidgetProps {
  config: WidgetConfig;
  controller: ChatSessionController;
  agentsApi: AgentsApi;
}

export const SupportChatWidget = observer(({ config, controller, agentsApi }: SupportChatWidgetProps) => {
  const [isOpen, setIsOpen] = useState(false);
  const [agents, setAgents] = useState<AgentOption[]>([]);
  const widgetContainerRef = useRef<HTMLDivElement>(null);
  const { state } = controller;

  useEffect(() => {
    let cancelled = false;
    agentsApi.list().then(
      (list) => {
        if (!cancelled) setAgents(list);
      },
      (error: unknown) => log.warn('Could not load the assistant list', error),
    );
    return () => {
      cancelled = true;
    };
  }, [agentsApi]);

  useEffect(() => () => controller.dispose(), [controller]);

  const handleClose = useCallback(() => {
    setIsOpen(false);
    controller.close();
  }, [controller]);

  const handleToggle = useCallback(() => {
    setIsOpen((prev) => {
      if (prev) controller.close();
      return !prev;
    });
  }, [controller]);

  const isOpenRef = useRef(isOpen);
  isOpenRef.current = isOpen;

  useEffect(() => {
    window.SupportChat = {
      open: () => setIsOpen(true),
      close: handleClose,
      toggle: handleToggle,
      isOpen: () => isOpenRef.current,
    };
    return () => {
      delete window.SupportChat;
    };
  }, [handleClose, handleToggle]);

  useEffect(() => {
    const abortController = new AbortController();

    if (isOpen) {
      widgetContainerRef.current?.querySelector('textarea')?.focus();

      const escapeHandler = (e: KeyboardEvent) => {
        if (e.key === 'Escape') handleClose();
      };
      document.addEventListener('keydown', escapeHandler, { signal: abortController.signal });
    }

    return () => abortController.abort();
  }, [isOpen, handleClose]);

  const handleSelectAgent = useCallback(async (agentId: number | null) => {
    if (agentId === null) {
      controller.selectAgent(null);
      return;
    }
    try {
      const welcome = await agentsApi.welcome(agentId);
      controller.selectAgent(agentId, welcome.message);
    } catch (error) {
      log.warn('Could not load the welcome message', { agentId, error });
      controller.selectAgent(agentId);
    }
  }, [agentsApi, controller]);

  const titleId = 'support-chat-title';
  const escalated = state.mode === 'escalated';
  const title = escalated && state.escalation?.agentName
    ? `Live chat with ${state.escalation.agentName}`
    : 'Student support';
  const onLeft = config.position === 'bottom-left';

  return (
    <>
      {!config.noWidgetButton && (
        <button
          type="button"
          aria-label="Open support chat"
          aria-expanded={isOpen}
          onClick={handleToggle}
          className={classNames(
            'fixed bottom-5 z-[9999] flex h-14 w-14 items-center justify-center rounded-full shadow-lg',
            'bg-[#1D4ED8] text-white',
            { 'left-5': onLeft, 'right-5': !onLeft },
          )}
        >
          <ChatBubbleLeftRightIcon className="h-6 w-6" />
        </button>
      )}

      <div
        ref={widgetContainerRef}
        className={classNames(
          'fixed bottom-5 z-[9999] flex h-[560px] max-h-[calc(100vh-2.5rem)] w-[380px] max-w-[calc(100vw-2.5rem)]',
          'flex-col rounded-2xl border border-gray-200 bg-white shadow-xl transition-opacity duration-150',
          { 'left-5': onLeft, 'right-5': !onLeft },
          isOpen ? 'pointer-events-auto opacity-100' : 'pointer-events-none opacity-0',
        )}
        role="dialog"
        aria-labelledby={titleId}
        aria-modal="true"
      >
        <div className="flex flex-col gap-2 border-b border-gray-200 px-4 py-3">
          <div className="flex items-center justify-between">
            <span id={titleId} className="text-base font-semibold">{title}</span>
            <div className="flex items-center gap-1">
              {state.mode !== 'auto' && (
                <button
                  type="button"
                  onClick={controller.resetToAuto}
                  className="flex items-center gap-1 rounded-lg px-2 py-1 text-xs text-gray-600 hover:bg-gray-100"
                >
                  <ArrowUturnLeftIcon className="h-4 w-4" />
                  Back to assistant
                </button>
              )}
              <button
                type="button"
                className="rounded-lg p-1 text-gray-600 hover:bg-gray-100"
                onClick={handleClose}
                aria-label="Close"
              >
                <XMarkIcon className="h-5 w-5" />
              </button>
            </div>
          </div>
          {!escalated && agents.length > 0 && (
            <AgentSelector
              agents={agents}
              selectedAgentId={state.selectedAgentId}
              disabled={controller.isBusy}
              onSelect={(agentId) => {
                handleSelectAgent(agentId).catch((error: unknown) => log.error('Agent selection failed', error));
              }}
            />
          )}
        </div>

        {state.notice && (
          <div className="bg-amber-50 px-4 py-2 text-xs text-amber-800" role="status">{state.notice}</div>
        )}

        <div className="flex-1 overflow-hidden">
          <MessageList
            messages={state.messages}
            statusText={state.statusText}
            loading={state.loading}
            agentTyping={state.agentTyping}
          />
        </div>

        <Composer
          busy={controller.isBusy}
          placeholder={escalated ? 'Write to the staff member...' : 'Ask a question...'}
          onSend={controller.submit}
          onStop={controller.abort}
          onTyping={controller.setTyping}
        />
      </div>
    </>
  );
});
