import React, { useCallback, useEffect, useRef, useState } from 'react';
import classNames from '../../helpers/classNames';

const TYPING_IDLE_MS = 2_000;

export interface ComposerProps {
  busy: boolean;
  placeholder: string;
  onSend: (text: string) => boolean;
  onStop: () => void;
  onTyping: (isTyping: boolean) => void;
}

export const Composer: React.FC<ComposerProps> = ({ busy, placeholder, onSend, onStop, onTyping }) => {
  const [text, setText] = useState('');
  const typingTimer = useRef<ReturnType<typeof setTimeout> | null>(null);

  const stopTyping = useCallback(() => {
    if (typingTimer.current === null) return;
    clearTimeout(typingTimer.current);
    typingTimer.current = null;
    onTyping(false);
  }, [onTyping]);

  useEffect(() => () => {
    if (typingTimer.current !== null) clearTimeout(typingTimer.current);
  }, []);

  const handleChange = (value: string) => {
    setText(value);
    if (typingTimer.current === null) onTyping(true);
    else clearTimeout(typingTimer.current);
    typingTimer.current = setTimeout(stopTyping, TYPING_IDLE_MS);
  };

  const send = () => {
    if (!onSend(text)) return;
    setText('');
    stopTyping();
  };

  return (
    <form
      className="flex items-end gap-2 border-t border-gray-200 p-3"
      onSubmit={(e) => {
        e.preventDefault();
        send();
      }}
    >
      <textarea
        rows={1}
        value={text}
        placeholder={placeholder}
        className="max-h-32 flex-1 resize-none rounded-xl border border-gray-200 px-3 py-2 text-sm outline-none focus:border-[#1D4ED8]"
        onChange={(e) => handleChange(e.target.value)}
        onKeyDown={(e) => {
          if (e.key === 'Enter' && !e.shiftKey) {
            e.preventDefault();
            send();
          }
        }}
      />
      {busy ? (
        <button
          type="button"
          onClick={onStop}
          className="rounded-xl bg-gray-200 px-3 py-2 text-sm font-medium text-gray-700"
        >
          Stop
        </button>
      ) : (
        <button
          type="submit"
          disabled={!text.trim()}
          className={classNames(
            'rounded-xl px-3 py-2 text-sm font-medium text-white',
            text.trim() ? 'bg-[#1D4ED8]' : 'bg-blue-300',
          )}
        >
          Send
        </button>
      )}
    </form>
  );
};
