import { logger } from '../../helpers/logger';
import type { SpeechOutput } from './types';

const log = logger.child('speech');

export const silentSpeech: SpeechOutput = {
  speak: () => undefined,
};

const toSpeakable = (text: string) => text
  .replace(/https?:\/\/\S+/g, '')
  .replace(/[*_#`>]/g, '')
  .replace(/\s+/g, ' ')
  .trim();

/** Reads replies aloud through the Web Speech API when the browser has it. */
export const browserSpeech = (lang: string): SpeechOutput => {
  if (typeof window === 'undefined' || !('speechSynthesis' in window)) return silentSpeech;

  return {
    speak: (text) => {
      const speakable = toSpeakable(text);
      if (!speakable) return;
      try {
        window.speechSynthesis.cancel();
        const utterance = new SpeechSynthesisUtterance(speakable);
        utterance.lang = lang;
        window.speechSynthesis.speak(utterance);
      } catch (error) {
        log.warn('Speech synthesis failed', error);
      }
    },
  };
};
