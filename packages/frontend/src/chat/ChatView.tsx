import { MessageSquare } from "lucide-react";
import { useDocumentChat } from "../hooks/useDocumentChat";
import { ChatInput } from "./ChatInput";
import { ChatMessages } from "./ChatMessages";

export function ChatView() {
  const { messages, isSending, hasDocument, send } = useDocumentChat();

  return (
    <section className="panel chat-view" aria-label="Document chat">
      <h3>
        <MessageSquare size={16} aria-hidden="true" /> Ask about this document
      </h3>
      <ChatMessages messages={messages} isSending={isSending} />
      <ChatInput disabled={!hasDocument} isSending={isSending} onSend={send} />
    </section>
  );
}
