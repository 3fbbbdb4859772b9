import React, { useEffect, useRef } from 'react';
import classNames from '../../helpers/classNames';
import type { ChatMessage } from '../../lib/supportChat/types';

const bubbleClass = (message: ChatMessage) => {
  switch (message.role) {
    case 'user':
      return 'self-end bg-[#1D4ED8] text-white';
    case 'human_agent':
      return 'self-start bg-emerald-50 text-gray-900 border border-emerald-200';
    case 'system':
      return message.variant === 'error'
        ? 'self-center bg-red-50 text-red-700 text-xs'
        : 'self-center bg-gray-100 text-gray-600 text-xs';
    default:
      return message.variant === 'info'
        ? 'self-start bg-amber-50 text-gray-900 border border-amber-200'
        : 'self-start bg-gray-100 text-gray-900';
  }
};

const MessageBody: React.FC<{ message: ChatMessage }> = ({ message }) => {
  // `formatted` is built from escaped text.
  if (message.formatted !== undefined) {
    return <div dangerouslySetInnerHTML={{ __html: message.formatted }} />;
  }
  return <div className="whitespace-pre-wrap">{message.content}</div>;
};

export interface MessageListProps {
  messages: ChatMessage[];
  statusText: string | null;
  loading: boolean;
  agentTyping: string | null;
}

export const MessageList: React.FC<MessageListProps> = ({ messages, statusText, loading, agentTyping }) => {
  const bottomRef = useRef<HTMLDivElement>(null);
  const last = messages[messages.length - 1];

  useEffect(() => {
    bottomRef.current?.scrollIntoView({ block: 'end' });
  }, [messages.length, last?.content, statusText, agentTyping]);

  return (
    <div className="flex h-full flex-col gap-2 overflow-y-auto px-4 py-3 text-sm" aria-live="polite">
      {messages.map((message) => (
        <div
          key={message.id}
          className={classNames('max-w-[85%] rounded-2xl px-3 py-2 break-words', bubbleClass(message))}
        >
          {message.role === 'human_agent' && message.authorName && (
            <div className="mb-1 text-xs font-semibold text-emerald-700">{message.authorName}</div>
          )}
          <MessageBody message={message} />
          {message.sources && message.sources.length > 0 && !message.streaming && (
            <ul className="mt-2 border-t border-gray-200 pt-1 text-xs text-gray-500">
              {message.sources.map((source) => (
                <li key={source.id}>
                  {source.url
                    ? <a href={source.url} target="_blank" rel="noopener noreferrer" className="underline">{source.title}</a>
                    : source.title}
                </li>
              ))}
            </ul>
          )}
        </div>
      ))}

      {(loading || statusText) && (
        <div className="self-start text-xs italic text-gray-500">{statusText ?? '...'}</div>
      )}
      {agentTyping && (
        <div className="self-start text-xs italic text-emerald-700">{`${agentTyping} is typing...`}</div>
      )}
      <div ref={bottomRef} />
    </div>
  );
};
