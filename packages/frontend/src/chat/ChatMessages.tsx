import { Bot, Loader2, User } from "lucide-react";
import { useEffect, useRef } from "react";
import type { ChatMessage } from "@plainlex/shared";

interface ChatMessagesProps {
  messages: ChatMessage[];
  isSending: boolean;
}

function formatMessageTime(date: Date): string {
  return new Intl.DateTimeFormat("en-US", {
    hour: "2-digit",
    minute: "2-digit"
  }).format(date);
}

export function ChatMessages({ messages, isSending }: ChatMessagesProps) {
  const messagesEndRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    // jsdom has no scrollIntoView
    messagesEndRef.current?.scrollIntoView?.({ behavior: "smooth" });
  }, [messages.length, isSending]);

  return (
    <section className="chat-messages-panel" aria-label="Chat messages">
      {messages.length === 0 && !isSending ? (
        <p className="muted chat-empty">Ask anything about the simplified document.</p>
      ) : null}

      {messages.map((message) => {
        const isBot = message.sender === "bot";
        return (
          <article key={message.id} className={isBot ? "chat-message is-bot" : "chat-message is-user"}>
            <span className="message-icon" aria-hidden="true">
              {isBot ? <Bot size={15} /> : <User size={15} />}
            </span>
            <div className="chat-message-bubble">
              <p>{message.text}</p>
              <time className="muted" dateTime={message.createdAt.toISOString()}>
                {formatMessageTime(message.createdAt)}
              </time>
            </div>
          </article>
        );
      })}

      {isSending ? (
        <p className="muted chat-pending">
          <Loader2 size={14} className="spin" aria-hidden="true" /> Thinking...
        </p>
      ) : null}
      <div ref={messagesEndRef} />
    </section>
  );
}
