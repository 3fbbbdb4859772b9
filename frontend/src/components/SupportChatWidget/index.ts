export * from './SupportChatWidget';
export * from './types';
