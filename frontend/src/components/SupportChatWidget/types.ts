export interface WidgetConfig {
  rootUrl: string;
  origin: string;
  position: 'bottom-right' | 'bottom-left';
  noWidgetButton: boolean;
  sessionTimeoutMinutes: number;
  speechLang: string | null;
}

export interface SupportChatApi {
  open(): void;
  close(): void;
  toggle(): void;
  isOpen(): boolean;
}

declare global {
  interface Window {
    SupportChat?: SupportChatApi;
  }
}
