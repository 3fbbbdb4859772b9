import ReactDOM from 'react-dom/client';
import './styles/widget.css';
import { SupportChatWidget, type WidgetConfig } from './components/SupportChatWidget';
import { logger } from './helpers/logger';
import { AgentsApi } from './lib/supportChat/agentsApi';
import { ChatSessionController } from './lib/supportChat/chatSessionController';
import { escalationChannelFactory } from './lib/supportChat/escalationChannel';
import { browserStorage, SessionStore } from './lib/supportChat/sessionStore';
import { browserSpeech, silentSpeech } from './lib/supportChat/speech';
import { FetchStreamTransport } from './lib/supportChat/streamTransport';

const DEFAULT_TIMEOUT_MINUTES = 10;

const getScriptConfig = (): WidgetConfig => {
  const scripts = document.getElementsByTagName('script');
  const currentScript: HTMLScriptElement | undefined = document.currentScript instanceof HTMLScriptElement
    ? document.currentScript
    : scripts[scripts.length - 1];
  const data: DOMStringMap = currentScript?.dataset ?? {};
  const timeout = Number(data.sessionTimeoutMinutes);

  return {
    rootUrl: data.rootUrl || window.location.origin,
    origin: data.origin || 'web',
    position: data.position === 'bottom-left' ? 'bottom-left' : 'bottom-right',
    noWidgetButton: data.noWidgetButton === 'true'
      || (!!currentScript?.hasAttribute('data-no-widget-button') && !data.noWidgetButton),
    sessionTimeoutMinutes: Number.isFinite(timeout) && timeout > 0 ? timeout : DEFAULT_TIMEOUT_MINUTES,
    speechLang: data.speechLang || null,
  };
};

const loadStyles = async (config: WidgetConfig, shadowRoot: ShadowRoot) => {
  const cssUrl = `${config.rootUrl}/web-widget/support-chat-widget.css`;

  const cssText = await fetch(cssUrl).then((response) => response.text());
  const stylesheet = new CSSStyleSheet();
  stylesheet.replaceSync(cssText);
  shadowRoot.adoptedStyleSheets = [stylesheet];
};

const initWidget = async () => {
  const config = getScriptConfig();
  if (new URLSearchParams(window.location.search).has('support_chat_debug')) logger.setLevel('debug');

  const rootContainer = document.createElement('div');
  rootContainer.id = 'support-chat-widget-root';
  document.body.appendChild(rootContainer);

  const shadow = rootContainer.attachShadow({ mode: 'open' });
  const reactRootDiv = document.createElement('div');
  shadow.appendChild(reactRootDiv);

  try {
    await loadStyles(config, shadow);
  } catch (error) {
    logger.warn('Widget styles could not be loaded', error);
  }

  const controller = new ChatSessionController({
    sessionStore: new SessionStore({
      storage: browserStorage(),
      origin: config.origin,
      pagePath: () => window.location.pathname,
      timeoutMs: config.sessionTimeoutMinutes * 60_000,
    }),
    transport: new FetchStreamTransport(config.rootUrl),
    channelFactory: escalationChannelFactory(config.rootUrl),
    origin: config.origin,
    speech: config.speechLang ? browserSpeech(config.speechLang) : silentSpeech,
  });

  const root = ReactDOM.createRoot(reactRootDiv);
  root.render(
    <SupportChatWidget config={config} controller={controller} agentsApi={new AgentsApi(config.rootUrl)} />,
  );
};

const start = () => {
  initWidget().catch((error: unknown) => logger.error('Widget failed to start', error));
};

if (document.readyState === 'loading') document.addEventListener('DOMContentLoaded', start);
else start();
