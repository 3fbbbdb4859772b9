import './agents';
import './chat/stream';
import './conversations/getConversation';
import './health';
